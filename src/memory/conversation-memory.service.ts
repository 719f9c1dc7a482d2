import { Inject, Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuidv4 } from 'uuid';
import { ConversationWindow } from './utils/conversation-window';
import { ExtractedFacts, FactExtractor } from './utils/fact-extractor';
import { ConversationSummarizerService } from './conversation-summarizer.service';
import { MemoryConfig } from './interfaces/memory-config.interface';
import { loadMemoryConfig } from './memory.config';
import {
  ChatHistory,
  ChatHistoryMessage,
  SessionRecord,
  TurnMetadata,
  TurnStats,
} from '../session/interfaces/session.interface';
import { MessageRole, SessionMessageDto } from '../session/dto/session-message.dto';
import { LockRegistry } from '../locks/lock-registry';
import { SessionPersistenceService } from '../persistence/session-persistence.service';
import { PersistedTurn } from '../persistence/interfaces/conversation-sink.interface';
import {
  AppendPersistenceError,
  ConversationNotFoundError,
} from '../common/errors/session.errors';
import { CLOCK, Clock, systemClock } from '../common/clock/clock';
import { errorMessage } from '../common/utils/async.utils';

/**
 * Per-session conversation windows.
 *
 * Appends to one session are serialized by that session's lock, which is
 * held across the durable turn write. Reads (`contextString`,
 * `chatHistory`) take no lock.
 */
@Injectable()
export class ConversationMemoryService implements OnModuleDestroy {
  private readonly logger = new Logger(ConversationMemoryService.name);
  private readonly windows = new Map<string, ConversationWindow<SessionMessageDto>>();
  private readonly factExtractor = new FactExtractor();
  private readonly config: MemoryConfig;
  private readonly clock: Clock;

  constructor(
    private readonly locks: LockRegistry,
    private readonly persistence: SessionPersistenceService,
    private readonly summarizer: ConversationSummarizerService,
    @Optional() private readonly configService?: ConfigService,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.config = loadMemoryConfig(this.configService);
    this.clock = clock ?? systemClock;

    this.logger.log(
      `Conversation memory initialized: window=${this.config.maxExchanges * 2} messages, ` +
        `summary=${this.config.summary.enabled ? `on (trigger ${this.config.summary.triggerCount})` : 'off'}`,
    );
  }

  onModuleDestroy(): void {
    this.windows.clear();
    this.summarizer.clear();
  }

  create(sessionId: string): void {
    if (this.windows.has(sessionId)) return;
    this.windows.set(
      sessionId,
      new ConversationWindow<SessionMessageDto>(this.config.maxExchanges * 2),
    );
  }

  has(sessionId: string): boolean {
    return this.windows.has(sessionId);
  }

  /**
   * Free a session's window, its lock and its cached summaries
   */
  delete(sessionId: string): boolean {
    const existed = this.windows.delete(sessionId);
    this.locks.release(sessionId);
    this.summarizer.forgetSession(sessionId);
    return existed;
  }

  size(): number {
    return this.windows.size;
  }

  sessionIds(): string[] {
    return Array.from(this.windows.keys());
  }

  messageCount(sessionId: string): number {
    return this.windows.get(sessionId)?.length() ?? 0;
  }

  /**
   * Record one exchange.
   *
   * @throws ConversationNotFoundError when the session has no window
   * @throws AppendPersistenceError when turn writes are enabled and the
   *   write failed; the exchange is rolled back first
   *
   * Facts found in the user message are kept only once the turn is recorded.
   */
  async append(
    session: SessionRecord,
    userMessage: string,
    assistantMessage: string,
    meta: TurnMetadata = {},
  ): Promise<TurnStats> {
    const sessionId = session.sessionId;
    const facts = this.extractFacts(sessionId, userMessage);

    const turn = await this.locks.runExclusive(sessionId, async () => {
      const window = this.windows.get(sessionId);
      if (!window) {
        throw new ConversationNotFoundError(sessionId);
      }

      const now = this.clock.now();
      const stats: TurnStats = {
        messageId: meta.messageId ?? uuidv4(),
        timestamp: new Date(now),
        userMessage,
        assistantMessage,
        tokens: meta.tokens ?? 0,
        processingTimeMs: meta.processingTimeMs ?? 0,
        modelInfo: meta.modelInfo,
        topic: meta.topic,
        sources: meta.sources ?? [],
        debugTrace: meta.debugTrace,
      };

      const mutation = window.append(
        SessionMessageDto.user(userMessage, now),
        SessionMessageDto.assistant(assistantMessage, now),
      );
      const turns = session.messagesMetadata;
      turns.push(stats);
      const droppedTurns =
        turns.length > this.config.turnMetadataLimit
          ? turns.splice(0, turns.length - this.config.turnMetadataLimit)
          : [];

      if (this.persistence.persistTurnsEnabled) {
        try {
          await this.persistence.persistTurn(this.toPersistedTurn(sessionId, stats));
        } catch (error) {
          window.revert(mutation);
          turns.pop();
          turns.unshift(...droppedTurns);
          this.logger.error(
            `Turn ${stats.messageId} rolled back for session ${sessionId}: ${errorMessage(error)}`,
          );
          throw new AppendPersistenceError(sessionId, error);
        }
      }

      return stats;
    });

    this.applyFacts(session, facts);
    if (turn.topic && !session.topics.includes(turn.topic)) {
      session.topics.push(turn.topic);
    }
    session.updatedAt = new Date(this.clock.now());
    // The window shifted; summaries keyed by the old turn count are stale
    this.summarizer.forgetSession(sessionId);

    return turn;
  }

  /**
   * Prompt-ready rendering of what is known about the session
   */
  async contextString(session: SessionRecord): Promise<string> {
    const window = this.windows.get(session.sessionId);
    if (!window) {
      return '';
    }

    const parts: string[] = [];

    if (session.userName) {
      parts.push(`User name: ${session.userName}`);
    }
    for (const [key, value] of Object.entries(session.userInfo)) {
      parts.push(`User ${key}: ${value}`);
    }
    if (session.topics.length > 0) {
      parts.push(`Topics: ${session.topics.join(', ')}`);
    }

    const entries = window.toArray();
    const turnCount = window.turnCount();
    const summary = this.config.summary;

    if (summary.enabled && turnCount > summary.triggerCount) {
      const recentSize = summary.recentExchanges * 2;
      const older = window.head(recentSize);
      const recent = window.tail(recentSize);

      if (older.length > 0) {
        const text = await this.summarizer.summarize(session.sessionId, turnCount, older);
        parts.push(`\n[Earlier conversation summary]\n${text}`);
      }
      if (recent.length > 0) {
        parts.push('\n[Recent conversation]');
        parts.push(...recent.map((entry) => this.renderEntry(entry)));
      }
    } else if (entries.length > 0) {
      parts.push('\nRecent conversation:');
      parts.push(...entries.map((entry) => this.renderEntry(entry)));
    }

    const facts = Object.entries(session.facts);
    if (facts.length > 0) {
      parts.push('\nRemembered facts:');
      parts.push(...facts.map(([key, value]) => `- ${key}: ${value}`));
    }

    return parts.join('\n');
  }

  /**
   * Window entries joined with the stats of the turns they belong to.
   * Pairs are aligned from the most recent turn backwards.
   */
  chatHistory(session: SessionRecord): ChatHistory {
    const window = this.windows.get(session.sessionId);
    if (!window) {
      return { messages: [], messageCount: 0 };
    }

    const entries = window.toArray();
    const turns = session.messagesMetadata;
    const pairCount = Math.ceil(entries.length / 2);

    const messages = entries.map((entry, index): ChatHistoryMessage => {
      const message: ChatHistoryMessage = {
        role: entry.role,
        content: entry.content,
        timestamp: new Date(entry.timestamp).toISOString(),
      };

      const turnIndex = turns.length - pairCount + Math.floor(index / 2);
      const turn = turnIndex >= 0 ? turns[turnIndex] : undefined;
      if (entry.role === MessageRole.ASSISTANT && turn) {
        message.messageId = turn.messageId;
        message.tokens = turn.tokens;
        message.processingTimeMs = turn.processingTimeMs;
        if (turn.modelInfo) {
          message.modelInfo = turn.modelInfo;
        }
      }
      return message;
    });

    return { messages, messageCount: messages.length };
  }

  private extractFacts(sessionId: string, message: string): ExtractedFacts {
    try {
      return this.factExtractor.extract(message);
    } catch (error) {
      this.logger.warn(`Fact extraction failed for ${sessionId}: ${errorMessage(error)}`);
      return {};
    }
  }

  private applyFacts(session: SessionRecord, facts: ExtractedFacts): void {
    if (facts.userName) {
      session.userName = facts.userName;
      session.facts.name = facts.userName;
    }
    if (facts.age !== undefined) {
      session.userInfo.age = facts.age;
      session.facts.age = `${facts.age} years old`;
    }
  }

  private renderEntry(entry: SessionMessageDto): string {
    return `${entry.role === MessageRole.USER ? 'User' : 'Assistant'}: ${entry.content}`;
  }

  private toPersistedTurn(sessionId: string, turn: TurnStats): PersistedTurn {
    return {
      sessionId,
      messageId: turn.messageId,
      userMessage: turn.userMessage,
      assistantMessage: turn.assistantMessage,
      tokens: turn.tokens,
      processingTimeMs: turn.processingTimeMs,
      modelInfo: turn.modelInfo,
      topic: turn.topic,
      sources: turn.sources,
      timestamp: turn.timestamp,
    };
  }
}
