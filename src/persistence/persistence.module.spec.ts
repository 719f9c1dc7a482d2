import { Test } from '@nestjs/testing';
import { PersistenceModule } from './persistence.module';
import { CONVERSATION_SINK, ConversationSink } from './interfaces/conversation-sink.interface';
import { NoopConversationSink } from './sinks/noop-conversation.sink';
import { MongoConversationSink } from './sinks/mongo-conversation.sink';
import { SessionPersistenceService } from './session-persistence.service';
import { DatabaseModule } from '../database/database.module';

describe('PersistenceModule', () => {
  it('should bind the no-op sink when MongoDB is disabled', async () => {
    const module = await Test.createTestingModule({
      imports: [PersistenceModule.register({ mongoEnabled: false })],
    }).compile();

    const sink = module.get<ConversationSink>(CONVERSATION_SINK);
    expect(sink).toBeInstanceOf(NoopConversationSink);
    expect(module.get(SessionPersistenceService).sinkName).toBe('noop');

    await module.close();
  });

  it('should import the database and the Mongo sink when enabled', () => {
    const dynamic = PersistenceModule.register({ mongoEnabled: true });

    expect(dynamic.global).toBe(true);
    expect(dynamic.imports).toContain(DatabaseModule);
    expect(dynamic.providers).toContain(MongoConversationSink);
    expect(dynamic.exports).toEqual([CONVERSATION_SINK, SessionPersistenceService]);
  });

  it('should fall back to MONGODB_ENABLED', () => {
    const previous = process.env.MONGODB_ENABLED;
    process.env.MONGODB_ENABLED = 'true';
    try {
      expect(PersistenceModule.register().providers).toContain(MongoConversationSink);
    } finally {
      if (previous === undefined) {
        delete process.env.MONGODB_ENABLED;
      } else {
        process.env.MONGODB_ENABLED = previous;
      }
    }
  });
});
