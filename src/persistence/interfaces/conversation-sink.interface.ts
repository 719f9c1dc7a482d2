export const CONVERSATION_SINK = Symbol('CONVERSATION_SINK');

export interface PersistedSession {
  sessionId: string;
  createdAt: Date;
  lastAccessed: Date;
  metadata: Record<string, unknown>;
}

export interface PersistedTurn {
  sessionId: string;
  messageId: string;
  userMessage: string;
  assistantMessage: string;
  tokens: number;
  processingTimeMs: number;
  modelInfo?: Record<string, unknown>;
  topic?: string;
  sources: Record<string, unknown>[];
  timestamp: Date;
}

export interface SessionStatsUpdate {
  sessionId: string;
  messageCount: number;
  tokens: number;
  processingTimeMs: number;
  lastAccessedAt: Date;
}

/**
 * Durable store behind the session engine. Every call may fail or hang;
 * callers decide how much of that they tolerate.
 */
export interface ConversationSink {
  readonly name: string;
  saveSession(session: PersistedSession): Promise<void>;
  saveTurn(turn: PersistedTurn): Promise<void>;
  updateStats(update: SessionStatsUpdate): Promise<void>;
  isHealthy(): Promise<boolean>;
}
