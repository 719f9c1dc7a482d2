import { MessageRole } from '../dto/session-message.dto';
import { LockRegistryStats } from '../../locks/lock-registry';

export type TimestampInput = Date | number | string;

export type SessionUnavailableReason = 'not_found' | 'expired';

/**
 * Client-supplied details of one turn. Everything is optional; missing
 * values are filled in when the turn is recorded.
 */
export interface TurnMetadata {
  messageId?: string;
  tokens?: number;
  processingTimeMs?: number;
  modelInfo?: Record<string, unknown>;
  topic?: string;
  sources?: Record<string, unknown>[];
  debugTrace?: Record<string, unknown>;
}

/**
 * Stats of one recorded turn, kept in the session's messagesMetadata
 */
export interface TurnStats {
  messageId: string;
  timestamp: Date;
  userMessage: string;
  assistantMessage: string;
  tokens: number;
  processingTimeMs: number;
  modelInfo?: Record<string, unknown>;
  topic?: string;
  sources: Record<string, unknown>[];
  debugTrace?: Record<string, unknown>;
}

export interface SessionRecord {
  sessionId: string;
  createdAt: Date;
  updatedAt: Date;
  lastAccessed: Date;
  metadata: Record<string, unknown>;
  userName?: string;
  userInfo: Record<string, string | number>;
  facts: Record<string, string>;
  topics: string[];
  messagesMetadata: TurnStats[];
  enrichment: Record<string, unknown>;
}

export type SessionLookup =
  | { valid: true; session: SessionRecord; remainingTtlMs: number }
  | { valid: false; reason: 'not_found' }
  | { valid: false; reason: 'expired'; expiredForMs: number };

export interface CreateSessionOptions {
  sessionId?: string;
  metadata?: Record<string, unknown>;
}

export interface CreateSessionResult {
  sessionId: string;
  enrichment: Record<string, unknown>;
}

/**
 * A stored or legacy session. Timestamps may be Dates, ISO strings or
 * epoch numbers (seconds or milliseconds).
 */
export interface SessionSnapshot {
  sessionId: string;
  createdAt?: TimestampInput;
  updatedAt?: TimestampInput;
  lastAccessed?: TimestampInput;
  metadata?: Record<string, unknown>;
  userName?: string;
  userInfo?: Record<string, string | number>;
  facts?: Record<string, string>;
  topics?: string[];
  messagesMetadata?: Array<Omit<TurnStats, 'timestamp'> & { timestamp: TimestampInput }>;
}

export interface SessionStoreStats {
  totalSessions: number;
  activeSessions: number;
  totalConversations: number;
  cleanupRuns: number;
  sessionsInMemory: number;
  ttlMs: number;
  maxExchanges: number;
}

export interface SessionEngineStats extends SessionStoreStats {
  conversationsInMemory: number;
  locks: LockRegistryStats;
}

export interface ChatHistoryMessage {
  role: MessageRole;
  content: string;
  timestamp: string;
  messageId?: string;
  tokens?: number;
  processingTimeMs?: number;
  modelInfo?: Record<string, unknown>;
}

export interface ChatHistory {
  messages: ChatHistoryMessage[];
  messageCount: number;
}

export interface RecentExchange {
  user: string;
  assistant: string;
}
