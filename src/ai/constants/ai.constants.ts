export const AI_DEFAULTS = {
  PROVIDER: 'mock',
  MOCK_RESPONSE_DELAY_MS: 0,
  OPENAI_MODEL: 'gpt-4o-mini',
  GROQ_MODEL: 'llama-3.1-8b-instant',
  MAX_TOKENS: 1000,
  TEMPERATURE: 0.7,
  REQUEST_TIMEOUT_MS: 30000,
} as const;

export const AI_ERRORS = {
  PROVIDER_NOT_AVAILABLE: 'AI provider not available',
  EMPTY_RESPONSE: 'AI provider returned an empty response',
  INVALID_RESPONSE: 'AI provider returned an unexpected response body',
} as const;
