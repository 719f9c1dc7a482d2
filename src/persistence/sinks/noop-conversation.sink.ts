import { Injectable, Logger } from '@nestjs/common';
import {
  ConversationSink,
  PersistedSession,
  PersistedTurn,
  SessionStatsUpdate,
} from '../interfaces/conversation-sink.interface';

/**
 * Sink used when MongoDB is disabled. Accepts and discards every write.
 */
@Injectable()
export class NoopConversationSink implements ConversationSink {
  readonly name = 'noop';
  private readonly logger = new Logger(NoopConversationSink.name);

  constructor() {
    this.logger.warn(
      'Durable conversation storage disabled. Sessions live in memory only.',
    );
  }

  async saveSession(_session: PersistedSession): Promise<void> {
    return;
  }

  async saveTurn(_turn: PersistedTurn): Promise<void> {
    return;
  }

  async updateStats(_update: SessionStatsUpdate): Promise<void> {
    return;
  }

  async isHealthy(): Promise<boolean> {
    return true;
  }
}
