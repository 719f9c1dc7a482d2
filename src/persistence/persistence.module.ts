import { DynamicModule, Module, Provider } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { DatabaseModule } from '../database/database.module';
import { CONVERSATION_SINK } from './interfaces/conversation-sink.interface';
import { ChatSession, ChatSessionSchema } from './schemas/chat-session.schema';
import { ChatMessage, ChatMessageSchema } from './schemas/chat-message.schema';
import { MongoConversationSink } from './sinks/mongo-conversation.sink';
import { NoopConversationSink } from './sinks/noop-conversation.sink';
import { SessionPersistenceService } from './session-persistence.service';
import { parseBoolean } from '../config/config.utils';

export interface PersistenceModuleOptions {
  /** Defaults to the MONGODB_ENABLED environment variable */
  mongoEnabled?: boolean;
}

/**
 * Binds CONVERSATION_SINK to MongoDB or to a no-op sink. The choice is made
 * at module registration, so ConfigModule.forRoot must be listed first for
 * .env files to be loaded by then.
 */
@Module({})
export class PersistenceModule {
  static register(options: PersistenceModuleOptions = {}): DynamicModule {
    const mongoEnabled =
      options.mongoEnabled ?? parseBoolean(process.env.MONGODB_ENABLED, false);

    if (!mongoEnabled) {
      return PersistenceModule.build([], NoopConversationSink);
    }

    return PersistenceModule.build(
      [
        DatabaseModule,
        MongooseModule.forFeature([
          { name: ChatSession.name, schema: ChatSessionSchema },
          { name: ChatMessage.name, schema: ChatMessageSchema },
        ]),
      ],
      MongoConversationSink,
    );
  }

  private static build(
    imports: DynamicModule['imports'],
    sink: typeof MongoConversationSink | typeof NoopConversationSink,
  ): DynamicModule {
    const providers: Provider[] = [
      sink,
      { provide: CONVERSATION_SINK, useExisting: sink },
      SessionPersistenceService,
    ];

    return {
      module: PersistenceModule,
      global: true,
      imports,
      providers,
      exports: [CONVERSATION_SINK, SessionPersistenceService],
    };
  }
}
