export const PERSISTENCE_DEFAULTS = {
  PERSIST_TURNS: false,
  CREATE_TIMEOUT_MS: 2000,
  RETRY_ATTEMPTS: 3,
  ATTEMPT_TIMEOUT_MS: 1000,
  RETRY_DELAY_MS: 100,
} as const;
