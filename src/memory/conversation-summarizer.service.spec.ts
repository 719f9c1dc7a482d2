import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { ConversationSummarizerService } from './conversation-summarizer.service';
import { AIService } from '../ai/ai.service';
import { SessionMessageDto } from '../session/dto/session-message.dto';
import { CLOCK } from '../common/clock/clock';
import { ManualClock } from '../../test/helpers/manual-clock';
import { deferred } from '../../test/helpers/deferred';
import { testConfig } from '../../test/helpers/test-config';

describe('ConversationSummarizerService', () => {
  let service: ConversationSummarizerService;
  let clock: ManualClock;

  const mockAIService = {
    generate: jest.fn(),
  };

  const messages = [
    SessionMessageDto.user('How do tides work?', 0),
    SessionMessageDto.assistant('The moon pulls on the oceans.', 0),
  ];

  const build = async (values: Record<string, unknown> = {}): Promise<void> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ConversationSummarizerService,
        { provide: AIService, useValue: mockAIService },
        { provide: ConfigService, useValue: testConfig(values) },
        { provide: CLOCK, useValue: clock },
      ],
    }).compile();

    service = module.get<ConversationSummarizerService>(ConversationSummarizerService);
  };

  beforeEach(async () => {
    clock = new ManualClock();
    mockAIService.generate.mockResolvedValue('The user asked how tides work.');
    await build();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should ask the LLM for a summary of the transcript', async () => {
    await expect(service.summarize('s1', 9, messages)).resolves.toBe(
      'The user asked how tides work.',
    );

    expect(mockAIService.generate).toHaveBeenCalledWith(
      [
        'Summarize the conversation below in 2-3 concise sentences.',
        'Focus on the main topics and on what the user wanted to know.',
        '',
        'Conversation:',
        'User: How do tides work?',
        'Assistant: The moon pulls on the oceans.',
        '',
        'Summary:',
      ].join('\n'),
      { model: undefined, temperature: 0.3, maxTokens: 200 },
    );
  });

  it('should pass the configured summary model', async () => {
    await build({ SESSION_SUMMARY_MODEL: 'llama-3.1-8b-instant' });

    await service.summarize('s1', 9, messages);

    expect(mockAIService.generate).toHaveBeenCalledWith(expect.any(String), {
      model: 'llama-3.1-8b-instant',
      temperature: 0.3,
      maxTokens: 200,
    });
  });

  it('should serve repeated requests from the cache', async () => {
    await service.summarize('s1', 9, messages);
    await service.summarize('s1', 9, messages);

    expect(mockAIService.generate).toHaveBeenCalledTimes(1);
    expect(service.getCacheMetrics()).toMatchObject({ hits: 1, size: 1 });
  });

  it('should regenerate once the cache entry expires', async () => {
    await build({ SESSION_SUMMARY_CACHE_TTL_MS: 1000 });
    await service.summarize('s1', 9, messages);

    clock.advance(1001);
    await service.summarize('s1', 9, messages);

    expect(mockAIService.generate).toHaveBeenCalledTimes(2);
  });

  it('should share one LLM call between concurrent requests', async () => {
    const pending = deferred<string>();
    mockAIService.generate.mockReturnValueOnce(pending.promise);

    const first = service.summarize('s1', 9, messages);
    const second = service.summarize('s1', 9, messages);
    pending.resolve('shared summary');

    await expect(Promise.all([first, second])).resolves.toEqual([
      'shared summary',
      'shared summary',
    ]);
    expect(mockAIService.generate).toHaveBeenCalledTimes(1);
  });

  it('should fall back to a heuristic line when the LLM fails', async () => {
    mockAIService.generate.mockRejectedValueOnce(new Error('rate limited'));

    await expect(service.summarize('s1', 9, messages)).resolves.toBe(
      'User asked about: "How do tides work?..."',
    );
  });

  it('should not cache the fallback', async () => {
    mockAIService.generate.mockRejectedValueOnce(new Error('rate limited'));
    await service.summarize('s1', 9, messages);

    await expect(service.summarize('s1', 9, messages)).resolves.toBe(
      'The user asked how tides work.',
    );
    expect(mockAIService.generate).toHaveBeenCalledTimes(2);
  });

  it('should regenerate after the session is forgotten', async () => {
    await service.summarize('s1', 9, messages);

    service.forgetSession('s1');
    await service.summarize('s1', 9, messages);

    expect(mockAIService.generate).toHaveBeenCalledTimes(2);
  });

  it('should not cache a summary that finishes after the session was forgotten', async () => {
    const pending = deferred<string>();
    mockAIService.generate.mockReturnValueOnce(pending.promise);

    const stale = service.summarize('s1', 9, messages);
    service.forgetSession('s1');
    pending.resolve('summary of an older window');

    await expect(stale).resolves.toBe('summary of an older window');
    await expect(service.summarize('s1', 9, messages)).resolves.toBe(
      'The user asked how tides work.',
    );
    expect(mockAIService.generate).toHaveBeenCalledTimes(2);
  });

  it('should not join a pending call started before the session was forgotten', async () => {
    const pending = deferred<string>();
    mockAIService.generate.mockReturnValueOnce(pending.promise);

    const stale = service.summarize('s1', 9, messages);
    service.forgetSession('s1');
    const fresh = service.summarize('s1', 9, messages);
    pending.resolve('summary of an older window');

    await expect(stale).resolves.toBe('summary of an older window');
    await expect(fresh).resolves.toBe('The user asked how tides work.');
    expect(mockAIService.generate).toHaveBeenCalledTimes(2);
  });

  it('should leave pending calls of other sessions alone', async () => {
    const pending = deferred<string>();
    mockAIService.generate.mockReturnValueOnce(pending.promise);

    const other = service.summarize('s1_b', 9, messages);
    service.forgetSession('s1');
    pending.resolve('summary of s1_b');
    await other;

    await expect(service.summarize('s1_b', 9, messages)).resolves.toBe('summary of s1_b');
    expect(mockAIService.generate).toHaveBeenCalledTimes(1);
  });

  describe('fallbackSummary', () => {
    it('should truncate the first question', () => {
      const long = 'a'.repeat(80);
      expect(
        ConversationSummarizerService.fallbackSummary([SessionMessageDto.user(long, 0)]),
      ).toBe(`User asked about: "${'a'.repeat(50)}..."`);
    });

    it('should handle a transcript without user messages', () => {
      expect(
        ConversationSummarizerService.fallbackSummary([SessionMessageDto.assistant('hi', 0)]),
      ).toBe('Earlier conversation');
    });
  });
});
