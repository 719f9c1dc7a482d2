import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CONVERSATION_SINK,
  ConversationSink,
  PersistedSession,
  PersistedTurn,
  SessionStatsUpdate,
} from './interfaces/conversation-sink.interface';
import { RetryPolicy, isDuplicateKeyError, writeWithRetry } from './write-policy';
import { PERSISTENCE_DEFAULTS } from './persistence.constants';
import { readBoolean, readNumber } from '../config/config.utils';
import {
  OperationTimeoutError,
  errorMessage,
  withTimeout,
} from '../common/utils/async.utils';

export interface PersistenceSettings {
  persistTurns: boolean;
  createTimeoutMs: number;
  retry: RetryPolicy;
}

/**
 * Durable writes of the session engine, in two policies:
 *
 * - best-effort (`persistSession`, `recordTurnStats`): one time-boxed
 *   attempt; failures are logged and reported as `false`
 * - strict (`persistTurn`): retried per the retry policy; exhaustion throws
 */
@Injectable()
export class SessionPersistenceService {
  private readonly logger = new Logger(SessionPersistenceService.name);
  private readonly settings: PersistenceSettings;

  constructor(
    @Inject(CONVERSATION_SINK) private readonly sink: ConversationSink,
    @Optional() private readonly configService?: ConfigService,
  ) {
    this.settings = {
      persistTurns: readBoolean(
        this.configService,
        'SESSION_PERSIST_TURNS',
        PERSISTENCE_DEFAULTS.PERSIST_TURNS,
      ),
      createTimeoutMs: readNumber(
        this.configService,
        'SESSION_CREATE_PERSIST_TIMEOUT_MS',
        PERSISTENCE_DEFAULTS.CREATE_TIMEOUT_MS,
      ),
      retry: {
        attempts: readNumber(
          this.configService,
          'SESSION_PERSIST_RETRY_ATTEMPTS',
          PERSISTENCE_DEFAULTS.RETRY_ATTEMPTS,
        ),
        attemptTimeoutMs: readNumber(
          this.configService,
          'SESSION_PERSIST_ATTEMPT_TIMEOUT_MS',
          PERSISTENCE_DEFAULTS.ATTEMPT_TIMEOUT_MS,
        ),
        delayMs: readNumber(
          this.configService,
          'SESSION_PERSIST_RETRY_DELAY_MS',
          PERSISTENCE_DEFAULTS.RETRY_DELAY_MS,
        ),
      },
    };

    this.logger.log(
      `Persistence via '${this.sink.name}' sink, turn writes ${this.settings.persistTurns ? 'enabled' : 'disabled'}`,
    );
  }

  get sinkName(): string {
    return this.sink.name;
  }

  /** Whether appends must durably store each turn before succeeding */
  get persistTurnsEnabled(): boolean {
    return this.settings.persistTurns;
  }

  getSettings(): PersistenceSettings {
    return { ...this.settings, retry: { ...this.settings.retry } };
  }

  persistSession(session: PersistedSession): Promise<boolean> {
    return this.bestEffort(
      `Session write ${session.sessionId}`,
      () => this.sink.saveSession(session),
      this.settings.createTimeoutMs,
    );
  }

  /**
   * @throws PersistenceExhaustedError when every attempt failed
   */
  async persistTurn(turn: PersistedTurn): Promise<void> {
    const attempt = await writeWithRetry(
      `Turn write ${turn.sessionId}/${turn.messageId}`,
      () => this.sink.saveTurn(turn),
      this.settings.retry,
      this.logger,
    );
    if (attempt > 1) {
      this.logger.log(`Turn ${turn.messageId} stored on attempt ${attempt}`);
    }
  }

  recordTurnStats(update: SessionStatsUpdate): Promise<boolean> {
    return this.bestEffort(
      `Stats update ${update.sessionId}`,
      () => this.sink.updateStats(update),
      this.settings.retry.attemptTimeoutMs,
    );
  }

  async isHealthy(): Promise<boolean> {
    try {
      return await withTimeout(
        () => this.sink.isHealthy(),
        this.settings.retry.attemptTimeoutMs,
        'Sink health check',
      );
    } catch (error) {
      this.logger.warn(`Sink health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  private async bestEffort(
    operation: string,
    write: () => Promise<void>,
    timeoutMs: number,
  ): Promise<boolean> {
    try {
      await withTimeout(write, timeoutMs, operation);
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return true;
      }
      if (error instanceof OperationTimeoutError) {
        this.logger.warn(`${operation} timed out after ${timeoutMs}ms`);
      } else {
        this.logger.warn(`${operation} failed: ${errorMessage(error)}`);
      }
      return false;
    }
  }
}
