import { Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SessionStoreService, RestoreResult } from './session-store.service';
import {
  ChatHistory,
  CreateSessionOptions,
  CreateSessionResult,
  RecentExchange,
  SessionEngineStats,
  SessionLookup,
  SessionSnapshot,
  TurnMetadata,
  TurnStats,
} from './interfaces/session.interface';
import { MessageRole } from './dto/session-message.dto';
import { SESSION_DEFAULTS, SESSION_EVENTS } from './constants/session.constants';
import { ConversationMemoryService } from '../memory/conversation-memory.service';
import { LockRegistry } from '../locks/lock-registry';
import { SessionPersistenceService } from '../persistence/session-persistence.service';
import {
  AppendPersistenceError,
  SessionUnavailableError,
} from '../common/errors/session.errors';

/**
 * Entry point of the session engine for the API layer.
 *
 * Every operation that creates, deletes or expires a session updates the
 * store and the conversation memory together.
 */
@Injectable()
export class SessionService implements OnModuleDestroy {
  private readonly logger = new Logger(SessionService.name);

  constructor(
    private readonly store: SessionStoreService,
    private readonly memory: ConversationMemoryService,
    private readonly locks: LockRegistry,
    private readonly persistence: SessionPersistenceService,
    @Optional() private readonly eventEmitter?: EventEmitter2,
  ) {}

  onModuleDestroy(): void {
    for (const sessionId of this.memory.sessionIds()) {
      this.memory.delete(sessionId);
    }
    this.store.clear();
    this.locks.clear();
  }

  async createSession(options: CreateSessionOptions = {}): Promise<CreateSessionResult> {
    const result = await this.store.create(options, (session) => {
      this.memory.create(session.sessionId);
    });

    this.eventEmitter?.emit(SESSION_EVENTS.SESSION_CREATED, {
      sessionId: result.sessionId,
      requestedId: options.sessionId,
    });
    return result;
  }

  getSession(sessionId: string, context?: Record<string, unknown>): SessionLookup {
    const lookup = this.store.get(sessionId, context);

    if (!lookup.valid && lookup.reason === 'expired') {
      this.memory.delete(sessionId);
      this.eventEmitter?.emit(SESSION_EVENTS.SESSION_EXPIRED, {
        sessionId,
        expiredForMs: lookup.expiredForMs,
      });
    }

    return lookup;
  }

  deleteSession(sessionId: string): boolean {
    const removed = this.store.delete(sessionId);
    const hadMemory = this.memory.delete(sessionId);

    if (removed) {
      this.eventEmitter?.emit(SESSION_EVENTS.SESSION_DELETED, { sessionId });
    }
    return removed || hadMemory;
  }

  getStats(): SessionEngineStats {
    return {
      ...this.store.stats(),
      conversationsInMemory: this.memory.size(),
      locks: this.locks.getStats(),
    };
  }

  /**
   * Remove expired sessions and windows left without a session
   * @returns number of sessions removed
   */
  clearExpired(): number {
    const expired = this.store.sweepExpired();
    for (const sessionId of expired) {
      this.memory.delete(sessionId);
    }

    let orphans = 0;
    for (const sessionId of this.memory.sessionIds()) {
      if (!this.store.has(sessionId)) {
        this.memory.delete(sessionId);
        orphans++;
      }
    }

    if (orphans > 0) {
      this.logger.warn(`Freed ${orphans} conversation windows without a session`);
    }
    if (expired.length > 0) {
      this.eventEmitter?.emit(SESSION_EVENTS.SESSIONS_SWEPT, {
        sessionIds: expired,
        count: expired.length,
      });
    }
    return expired.length;
  }

  /**
   * Record one exchange of a valid session.
   *
   * @throws SessionUnavailableError when the session is unknown or expired
   * @throws AppendPersistenceError when the durable turn write failed
   */
  async addTurn(
    sessionId: string,
    userMessage: string,
    assistantMessage: string,
    meta?: TurnMetadata,
  ): Promise<TurnStats> {
    const lookup = this.getSession(sessionId);
    if (!lookup.valid) {
      throw new SessionUnavailableError(sessionId, lookup.reason);
    }

    let turn: TurnStats;
    try {
      turn = await this.memory.append(lookup.session, userMessage, assistantMessage, meta);
    } catch (error) {
      if (error instanceof AppendPersistenceError) {
        this.eventEmitter?.emit(SESSION_EVENTS.TURN_REJECTED, { sessionId });
      }
      throw error;
    }

    this.store.incrementConversationCount();
    await this.persistence.recordTurnStats({
      sessionId,
      messageCount: 2,
      tokens: turn.tokens,
      processingTimeMs: turn.processingTimeMs,
      lastAccessedAt: lookup.session.lastAccessed,
    });

    this.eventEmitter?.emit(SESSION_EVENTS.TURN_ADDED, {
      sessionId,
      messageId: turn.messageId,
      topic: turn.topic,
    });
    return turn;
  }

  async contextString(sessionId: string): Promise<string> {
    const lookup = this.getSession(sessionId);
    if (!lookup.valid) {
      return '';
    }
    return this.memory.contextString(lookup.session);
  }

  chatHistory(sessionId: string): ChatHistory {
    const lookup = this.getSession(sessionId);
    if (!lookup.valid) {
      return { messages: [], messageCount: 0 };
    }
    return this.memory.chatHistory(lookup.session);
  }

  /**
   * Most recent `count` user/assistant pairs, oldest first
   */
  recentExchanges(
    sessionId: string,
    count: number = SESSION_DEFAULTS.RECENT_EXCHANGES,
  ): RecentExchange[] {
    if (count <= 0) {
      return [];
    }

    const { messages } = this.chatHistory(sessionId);
    const exchanges: RecentExchange[] = [];

    for (let i = 0; i + 1 < messages.length; i += 2) {
      const user = messages[i];
      const assistant = messages[i + 1];
      if (user.role === MessageRole.USER && assistant.role === MessageRole.ASSISTANT) {
        exchanges.push({ user: user.content, assistant: assistant.content });
      }
    }

    return exchanges.slice(-count);
  }

  /**
   * Debug trace recorded with one turn, if the session and turn exist
   */
  getDebugTrace(sessionId: string, messageId: string): Record<string, unknown> | undefined {
    const lookup = this.getSession(sessionId);
    if (!lookup.valid) {
      return undefined;
    }

    const turn = lookup.session.messagesMetadata.find((t) => t.messageId === messageId);
    return turn?.debugTrace;
  }

  /**
   * Load a stored or legacy session into memory. Conversation entries are
   * not part of a snapshot; the session starts with an empty window.
   */
  async restoreSession(snapshot: SessionSnapshot): Promise<RestoreResult> {
    const result = await this.store.restore(snapshot);
    if (result.restored) {
      this.memory.create(snapshot.sessionId);
      this.eventEmitter?.emit(SESSION_EVENTS.SESSION_RESTORED, {
        sessionId: snapshot.sessionId,
      });
    }
    return result;
  }
}
