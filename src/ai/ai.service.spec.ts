import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { AIService } from './ai.service';
import { MockAIProvider } from './providers/mock-ai.provider';
import { OpenAIProvider } from './providers/openai.provider';
import { GroqProvider } from './providers/groq.provider';
import { AICompletionResult } from './interfaces/ai-provider.interface';
import { AI_ERRORS } from './constants/ai.constants';

describe('AIService', () => {
  let service: AIService;

  const config: Record<string, unknown> = {};
  const mockConfigService = {
    get: jest.fn((key: string) => config[key]),
  };

  const mockMockProvider = {
    name: 'mock',
    isAvailable: true,
    generateCompletion: jest.fn(),
  };

  const mockOpenAIProvider = {
    name: 'openai',
    isAvailable: false,
    generateCompletion: jest.fn(),
  };

  const mockGroqProvider = {
    name: 'groq',
    isAvailable: false,
    generateCompletion: jest.fn(),
  };

  const createService = async (): Promise<AIService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AIService,
        { provide: ConfigService, useValue: mockConfigService },
        { provide: MockAIProvider, useValue: mockMockProvider },
        { provide: OpenAIProvider, useValue: mockOpenAIProvider },
        { provide: GroqProvider, useValue: mockGroqProvider },
      ],
    }).compile();

    const created = module.get<AIService>(AIService);
    created.onModuleInit();
    return created;
  };

  const completion = (content: string): AICompletionResult => ({
    content,
    finishReason: 'stop',
    usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
  });

  beforeEach(async () => {
    jest.clearAllMocks();
    for (const key of Object.keys(config)) {
      delete config[key];
    }
    mockOpenAIProvider.isAvailable = false;
    mockGroqProvider.isAvailable = false;

    service = await createService();
  });

  describe('initialization', () => {
    it('should use mock provider by default', () => {
      expect(service.currentProvider).toBe('mock');
      expect(service.isUsingFallback).toBe(false);
    });

    it('should list only available providers', () => {
      expect(service.getAvailableProviders()).toEqual(['mock']);
    });
  });

  describe('provider selection', () => {
    it('should fall back to mock when groq is configured but unavailable', async () => {
      config.AI_PROVIDER = 'groq';

      const fallbackService = await createService();

      expect(fallbackService.currentProvider).toBe('mock');
      expect(fallbackService.isUsingFallback).toBe(true);
    });

    it('should use groq when it is configured and available', async () => {
      config.AI_PROVIDER = 'groq';
      mockGroqProvider.isAvailable = true;

      const groqService = await createService();

      expect(groqService.currentProvider).toBe('groq');
      expect(groqService.isUsingFallback).toBe(false);
    });

    it('should fall back to mock for an unknown provider name', async () => {
      config.AI_PROVIDER = 'unknown';

      const fallbackService = await createService();

      expect(fallbackService.currentProvider).toBe('mock');
    });
  });

  describe('generateCompletion', () => {
    it('should delegate to the active provider', async () => {
      mockMockProvider.generateCompletion.mockResolvedValueOnce(completion('hi'));

      const result = await service.generateCompletion([], { maxTokens: 10 });

      expect(result.content).toBe('hi');
      expect(mockMockProvider.generateCompletion).toHaveBeenCalledWith([], {
        maxTokens: 10,
      });
    });

    it('should rethrow provider errors', async () => {
      mockMockProvider.generateCompletion.mockRejectedValueOnce(new Error('boom'));

      await expect(service.generateCompletion([])).rejects.toThrow('boom');
    });

    it('should time out slow providers', async () => {
      config.AI_REQUEST_TIMEOUT_MS = 20;
      const slowService = await createService();
      mockMockProvider.generateCompletion.mockImplementationOnce(
        () => new Promise((resolve) => setTimeout(() => resolve(completion('late')), 200)),
      );

      await expect(slowService.generateCompletion([])).rejects.toThrow(
        'mock completion timed out after 20ms',
      );
    });
  });

  describe('generate', () => {
    it('should send the prompt as a single user message and trim the reply', async () => {
      mockMockProvider.generateCompletion.mockResolvedValueOnce(
        completion('  A short summary.  '),
      );

      const text = await service.generate('Summarize this', { temperature: 0.3 });

      expect(text).toBe('A short summary.');
      const [messages, options] = mockMockProvider.generateCompletion.mock.calls[0];
      expect(messages).toHaveLength(1);
      expect(messages[0].role).toBe('user');
      expect(messages[0].content).toBe('Summarize this');
      expect(options).toEqual({ temperature: 0.3 });
    });

    it('should reject empty replies', async () => {
      mockMockProvider.generateCompletion.mockResolvedValueOnce(completion('   '));

      await expect(service.generate('Summarize this')).rejects.toThrow(
        AI_ERRORS.EMPTY_RESPONSE,
      );
    });
  });

  describe('switchProvider', () => {
    it('should refuse an unavailable provider', () => {
      expect(service.switchProvider('openai')).toBe(false);
      expect(service.currentProvider).toBe('mock');
    });

    it('should switch to an available provider', () => {
      mockOpenAIProvider.isAvailable = true;

      expect(service.switchProvider('openai')).toBe(true);
      expect(service.currentProvider).toBe('openai');
    });
  });
});
