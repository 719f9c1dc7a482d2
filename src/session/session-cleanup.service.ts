import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  Optional,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SessionStoreService } from './session-store.service';
import { ConversationMemoryService } from '../memory/conversation-memory.service';
import { SESSION_EVENTS } from './constants/session.constants';
import { loadSessionConfig } from './session.config';
import { errorMessage } from '../common/utils/async.utils';

/**
 * Periodic removal of expired sessions together with their memory.
 * Complements the lazy expiry done on lookup.
 */
@Injectable()
export class SessionCleanupService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionCleanupService.name);
  private readonly intervalMs: number;
  private cleanupInterval?: NodeJS.Timeout;

  constructor(
    private readonly store: SessionStoreService,
    private readonly memory: ConversationMemoryService,
    @Optional() private readonly configService?: ConfigService,
    @Optional() private readonly eventEmitter?: EventEmitter2,
  ) {
    this.intervalMs = loadSessionConfig(this.configService).cleanupIntervalMs;
  }

  onModuleInit(): void {
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (this.cleanupInterval) return;

    this.cleanupInterval = setInterval(() => {
      this.runOnce();
    }, this.intervalMs);
    // Never keep the process alive on its own
    this.cleanupInterval.unref();

    this.logger.log(`Session cleanup every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = undefined;
      this.logger.log('Session cleanup stopped');
    }
  }

  isRunning(): boolean {
    return this.cleanupInterval !== undefined;
  }

  /**
   * One sweep. Errors are logged, never thrown, so the interval survives.
   * @returns ids of removed sessions
   */
  runOnce(): string[] {
    try {
      const removed = this.store.sweepExpired();
      for (const sessionId of removed) {
        this.memory.delete(sessionId);
      }
      this.store.incrementCleanupRuns();

      if (removed.length > 0) {
        this.eventEmitter?.emit(SESSION_EVENTS.SESSIONS_SWEPT, {
          sessionIds: removed,
          count: removed.length,
        });
      }
      return removed;
    } catch (error) {
      this.logger.error(`Session cleanup failed: ${errorMessage(error)}`);
      return [];
    }
  }
}
