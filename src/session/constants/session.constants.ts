export const SESSION_DEFAULTS = {
  TTL_MS: 7200000, // 2 hours
  MAX_EXCHANGES: 10,
  CLEANUP_INTERVAL_MS: 600000, // 10 minutes
  TURN_METADATA_LIMIT: 100,
  RECENT_EXCHANGES: 5,
} as const;

/**
 * Session lifecycle event names
 */
export const SESSION_EVENTS = {
  SESSION_CREATED: 'session.created',
  SESSION_RESTORED: 'session.restored',
  SESSION_EXPIRED: 'session.expired',
  SESSION_DELETED: 'session.deleted',
  SESSIONS_SWEPT: 'sessions.swept',
  TURN_ADDED: 'conversation.turn_added',
  TURN_REJECTED: 'conversation.turn_rejected',
} as const;
