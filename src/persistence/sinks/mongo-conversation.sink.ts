import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection, InjectModel } from '@nestjs/mongoose';
import { Connection, Model } from 'mongoose';
import {
  ConversationSink,
  PersistedSession,
  PersistedTurn,
  SessionStatsUpdate,
} from '../interfaces/conversation-sink.interface';
import { ChatSession, ChatSessionDocument } from '../schemas/chat-session.schema';
import { ChatMessage, ChatMessageDocument } from '../schemas/chat-message.schema';

@Injectable()
export class MongoConversationSink implements ConversationSink {
  readonly name = 'mongodb';
  private readonly logger = new Logger(MongoConversationSink.name);

  constructor(
    @InjectModel(ChatSession.name)
    private readonly sessionModel: Model<ChatSessionDocument>,
    @InjectModel(ChatMessage.name)
    private readonly messageModel: Model<ChatMessageDocument>,
    @InjectConnection() private readonly connection: Connection,
  ) {}

  async saveSession(session: PersistedSession): Promise<void> {
    await this.sessionModel
      .updateOne(
        { sessionId: session.sessionId },
        {
          $setOnInsert: {
            metadata: session.metadata,
            startedAt: session.createdAt,
          },
          $set: { lastAccessedAt: session.lastAccessed },
        },
        { upsert: true },
      )
      .exec();
    this.logger.debug(`Session stored: ${session.sessionId}`);
  }

  async saveTurn(turn: PersistedTurn): Promise<void> {
    await this.messageModel.create({
      sessionId: turn.sessionId,
      messageId: turn.messageId,
      userMessage: turn.userMessage,
      assistantMessage: turn.assistantMessage,
      tokens: turn.tokens,
      processingTimeMs: turn.processingTimeMs,
      modelInfo: turn.modelInfo,
      topic: turn.topic,
      sources: turn.sources,
      timestamp: turn.timestamp,
    });
    this.logger.debug(`Turn stored: ${turn.sessionId}/${turn.messageId}`);
  }

  async updateStats(update: SessionStatsUpdate): Promise<void> {
    await this.sessionModel
      .updateOne(
        { sessionId: update.sessionId },
        {
          $inc: {
            messageCount: update.messageCount,
            totalTokens: update.tokens,
            totalProcessingTimeMs: update.processingTimeMs,
          },
          $set: { lastAccessedAt: update.lastAccessedAt },
        },
        { upsert: true },
      )
      .exec();
  }

  async isHealthy(): Promise<boolean> {
    // 1 = connected
    return this.connection.readyState === 1;
  }
}
