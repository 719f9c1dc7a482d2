import { Test, TestingModule } from '@nestjs/testing';
import { getConnectionToken, getModelToken } from '@nestjs/mongoose';
import { MongoConversationSink } from './mongo-conversation.sink';
import { ChatSession } from '../schemas/chat-session.schema';
import { ChatMessage } from '../schemas/chat-message.schema';

describe('MongoConversationSink', () => {
  let sink: MongoConversationSink;

  const exec = jest.fn().mockResolvedValue({ acknowledged: true });
  const mockSessionModel = {
    updateOne: jest.fn(() => ({ exec })),
  };
  const mockMessageModel = {
    create: jest.fn().mockResolvedValue({}),
  };
  const mockConnection = { readyState: 1 };

  const at = new Date('2024-03-01T12:00:00.000Z');

  beforeEach(async () => {
    mockConnection.readyState = 1;

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        MongoConversationSink,
        { provide: getModelToken(ChatSession.name), useValue: mockSessionModel },
        { provide: getModelToken(ChatMessage.name), useValue: mockMessageModel },
        { provide: getConnectionToken(), useValue: mockConnection },
      ],
    }).compile();

    sink = module.get<MongoConversationSink>(MongoConversationSink);
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should be named mongodb', () => {
    expect(sink.name).toBe('mongodb');
  });

  it('should upsert a session without overwriting its start', async () => {
    await sink.saveSession({
      sessionId: 's1',
      createdAt: at,
      lastAccessed: at,
      metadata: { userAgent: 'test' },
    });

    expect(mockSessionModel.updateOne).toHaveBeenCalledWith(
      { sessionId: 's1' },
      {
        $setOnInsert: { metadata: { userAgent: 'test' }, startedAt: at },
        $set: { lastAccessedAt: at },
      },
      { upsert: true },
    );
    expect(exec).toHaveBeenCalledTimes(1);
  });

  it('should insert one document per turn', async () => {
    await sink.saveTurn({
      sessionId: 's1',
      messageId: 'm1',
      userMessage: 'hello',
      assistantMessage: 'hi',
      tokens: 5,
      processingTimeMs: 40,
      topic: 'greetings',
      sources: [{ id: 'doc-1' }],
      timestamp: at,
    });

    expect(mockMessageModel.create).toHaveBeenCalledWith({
      sessionId: 's1',
      messageId: 'm1',
      userMessage: 'hello',
      assistantMessage: 'hi',
      tokens: 5,
      processingTimeMs: 40,
      modelInfo: undefined,
      topic: 'greetings',
      sources: [{ id: 'doc-1' }],
      timestamp: at,
    });
  });

  it('should propagate insert failures', async () => {
    mockMessageModel.create.mockRejectedValueOnce(new Error('not primary'));

    await expect(
      sink.saveTurn({
        sessionId: 's1',
        messageId: 'm2',
        userMessage: 'a',
        assistantMessage: 'b',
        tokens: 0,
        processingTimeMs: 0,
        sources: [],
        timestamp: at,
      }),
    ).rejects.toThrow('not primary');
  });

  it('should increment aggregate counters', async () => {
    await sink.updateStats({
      sessionId: 's1',
      messageCount: 2,
      tokens: 30,
      processingTimeMs: 120,
      lastAccessedAt: at,
    });

    expect(mockSessionModel.updateOne).toHaveBeenCalledWith(
      { sessionId: 's1' },
      {
        $inc: { messageCount: 2, totalTokens: 30, totalProcessingTimeMs: 120 },
        $set: { lastAccessedAt: at },
      },
      { upsert: true },
    );
  });

  it('should be healthy only while connected', async () => {
    await expect(sink.isHealthy()).resolves.toBe(true);

    mockConnection.readyState = 0;
    await expect(sink.isHealthy()).resolves.toBe(false);
  });
});
