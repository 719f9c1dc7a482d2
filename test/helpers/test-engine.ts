import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { SessionService } from '@/session/session.service';
import { SessionStoreService } from '@/session/session-store.service';
import { SessionCleanupService } from '@/session/session-cleanup.service';
import { ConversationMemoryService } from '@/memory/conversation-memory.service';
import { ConversationSummarizerService } from '@/memory/conversation-summarizer.service';
import { LockRegistry } from '@/locks/lock-registry';
import { SessionPersistenceService } from '@/persistence/session-persistence.service';
import { CONVERSATION_SINK } from '@/persistence/interfaces/conversation-sink.interface';
import { AIService } from '@/ai/ai.service';
import { CLOCK } from '@/common/clock/clock';
import { FakeConversationSink } from './fake-conversation-sink';
import { ManualClock } from './manual-clock';
import { testConfig } from './test-config';

export interface TestEngine {
  module: TestingModule;
  sessions: SessionService;
  store: SessionStoreService;
  memory: ConversationMemoryService;
  summarizer: ConversationSummarizerService;
  cleanup: SessionCleanupService;
  locks: LockRegistry;
  sink: FakeConversationSink;
  clock: ManualClock;
  events: EventEmitter2;
  ai: { generate: jest.Mock };
}

/**
 * The session engine wired as in the application, over an in-process sink,
 * a manual clock and a stubbed LLM. Lifecycle hooks are not run, so the
 * periodic sweeper stays off unless a test starts it.
 */
export async function createTestEngine(
  config: Record<string, unknown> = {},
  sink: FakeConversationSink = new FakeConversationSink(),
): Promise<TestEngine> {
  const clock = new ManualClock();
  const events = new EventEmitter2();
  const ai = { generate: jest.fn().mockResolvedValue('Earlier the user asked about tides.') };

  const module = await Test.createTestingModule({
    providers: [
      LockRegistry,
      SessionPersistenceService,
      ConversationSummarizerService,
      ConversationMemoryService,
      SessionStoreService,
      SessionCleanupService,
      SessionService,
      { provide: CONVERSATION_SINK, useValue: sink },
      { provide: CLOCK, useValue: clock },
      { provide: EventEmitter2, useValue: events },
      { provide: AIService, useValue: ai },
      {
        provide: ConfigService,
        useValue: testConfig({ SESSION_PERSIST_RETRY_DELAY_MS: 0, ...config }),
      },
    ],
  }).compile();

  return {
    module,
    sessions: module.get(SessionService),
    store: module.get(SessionStoreService),
    memory: module.get(ConversationMemoryService),
    summarizer: module.get(ConversationSummarizerService),
    cleanup: module.get(SessionCleanupService),
    locks: module.get(LockRegistry),
    sink,
    clock,
    events,
    ai,
  };
}
