import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(3000),
  CORS_ORIGIN: Joi.string().default('*'),

  // Session lifecycle
  SESSION_TTL_MS: Joi.number().integer().min(1).default(7200000),
  SESSION_MAX_EXCHANGES: Joi.number().integer().min(1).default(10),
  SESSION_CLEANUP_INTERVAL_MS: Joi.number().integer().min(1).default(600000),
  SESSION_TURN_METADATA_LIMIT: Joi.number().integer().min(1).default(100),

  // Conversation summary
  SESSION_SUMMARY_ENABLED: Joi.boolean().default(false),
  SESSION_SUMMARY_TRIGGER_COUNT: Joi.number().integer().min(0).default(8),
  SESSION_SUMMARY_RECENT_EXCHANGES: Joi.number().integer().min(1).default(5),
  SESSION_SUMMARY_MODEL: Joi.string().optional(),
  SESSION_SUMMARY_CACHE_TTL_MS: Joi.number().integer().min(0).default(3600000),
  SESSION_SUMMARY_CACHE_MAX_SIZE: Joi.number().integer().min(1).default(100),

  // Durable writes
  SESSION_PERSIST_TURNS: Joi.boolean().default(false),
  SESSION_CREATE_PERSIST_TIMEOUT_MS: Joi.number().integer().min(1).default(2000),
  SESSION_PERSIST_RETRY_ATTEMPTS: Joi.number().integer().min(1).default(3),
  SESSION_PERSIST_ATTEMPT_TIMEOUT_MS: Joi.number().integer().min(1).default(1000),
  SESSION_PERSIST_RETRY_DELAY_MS: Joi.number().integer().min(0).default(100),

  LOCK_SHARD_COUNT: Joi.number().integer().min(1).default(16),

  MONGODB_ENABLED: Joi.boolean().default(false),
  MONGODB_URI: Joi.string()
    .uri({ scheme: ['mongodb', 'mongodb+srv'] })
    .default('mongodb://localhost:27017/conversation-sessions'),

  // Summarization LLM
  AI_PROVIDER: Joi.string().valid('mock', 'openai', 'groq').default('mock'),
  AI_REQUEST_TIMEOUT_MS: Joi.number().integer().min(1).default(30000),
  AI_MOCK_RESPONSE_DELAY_MS: Joi.number().integer().min(0).default(0),
  OPENAI_API_KEY: Joi.string().allow('').optional(),
  OPENAI_MODEL: Joi.string().optional(),
  OPENAI_MAX_TOKENS: Joi.number().integer().min(1).optional(),
  OPENAI_TEMPERATURE: Joi.number().min(0).max(2).optional(),
  GROQ_API_KEY: Joi.string().allow('').optional(),
  GROQ_MODEL: Joi.string().optional(),
  GROQ_MAX_TOKENS: Joi.number().integer().min(1).optional(),
  GROQ_TEMPERATURE: Joi.number().min(0).max(2).optional(),
});
