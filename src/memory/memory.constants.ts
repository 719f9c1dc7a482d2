export const MEMORY_DEFAULTS = {
  SUMMARY_ENABLED: false,
  SUMMARY_TRIGGER_COUNT: 8,
  SUMMARY_RECENT_EXCHANGES: 5,
  SUMMARY_CACHE_TTL_MS: 3600000, // 1 hour
  SUMMARY_CACHE_MAX_SIZE: 100,
  SUMMARY_TEMPERATURE: 0.3,
  SUMMARY_MAX_TOKENS: 200,
  FALLBACK_TOPIC_LENGTH: 50,
} as const;
