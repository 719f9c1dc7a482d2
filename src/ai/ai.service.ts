import { Injectable, Logger, OnModuleInit, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AIProvider,
  AICompletionOptions,
  AICompletionResult,
} from './interfaces/ai-provider.interface';
import { AIProviderType } from './interfaces/ai-config.interface';
import { SessionMessageDto } from '../session/dto/session-message.dto';
import { MockAIProvider } from './providers/mock-ai.provider';
import { OpenAIProvider } from './providers/openai.provider';
import { GroqProvider } from './providers/groq.provider';
import { AI_DEFAULTS, AI_ERRORS } from './constants/ai.constants';
import { readNumber, readString } from '../config/config.utils';
import { withTimeout } from '../common/utils/async.utils';

/**
 * The LLM used for conversation summaries.
 *
 * The provider named by AI_PROVIDER is selected at module init. When it is
 * unknown or has no credentials the offline mock takes its place.
 */
@Injectable()
export class AIService implements OnModuleInit {
  private readonly logger = new Logger(AIService.name);
  private readonly providers: ReadonlyMap<string, AIProvider>;
  private readonly fallback: AIProvider;
  private readonly configuredProvider: string;
  private readonly requestTimeoutMs: number;
  private active?: AIProvider;

  constructor(
    mockProvider: MockAIProvider,
    openaiProvider: OpenAIProvider,
    groqProvider: GroqProvider,
    @Optional() configService?: ConfigService,
  ) {
    this.fallback = mockProvider;
    this.providers = new Map(
      [mockProvider, openaiProvider, groqProvider].map(
        (provider): [string, AIProvider] => [provider.name, provider],
      ),
    );
    this.configuredProvider =
      readString(configService, 'AI_PROVIDER', AI_DEFAULTS.PROVIDER) ?? AI_DEFAULTS.PROVIDER;
    this.requestTimeoutMs = readNumber(
      configService,
      'AI_REQUEST_TIMEOUT_MS',
      AI_DEFAULTS.REQUEST_TIMEOUT_MS,
    );
  }

  onModuleInit(): void {
    this.active = this.selectProvider();
    this.logger.log(
      `LLM provider: ${this.active.name}${this.isUsingFallback ? ' (fallback)' : ''}`,
    );
  }

  get currentProvider(): string {
    return this.active?.name ?? 'none';
  }

  get isUsingFallback(): boolean {
    return this.configuredProvider !== this.fallback.name && this.active === this.fallback;
  }

  getAvailableProviders(): string[] {
    return Array.from(this.providers.values())
      .filter((provider) => provider.isAvailable)
      .map((provider) => provider.name);
  }

  async generateCompletion(
    messages: SessionMessageDto[],
    options?: AICompletionOptions,
  ): Promise<AICompletionResult> {
    const provider = this.active;
    if (!provider) {
      throw new Error(AI_ERRORS.PROVIDER_NOT_AVAILABLE);
    }

    try {
      const result = await withTimeout(
        () => provider.generateCompletion(messages, options),
        this.requestTimeoutMs,
        `${provider.name} completion`,
      );
      this.logger.debug(
        `${provider.name} answered ${messages.length} messages with ${result.content.length} chars`,
      );
      return result;
    } catch (error) {
      this.logger.error(`Completion failed with ${provider.name}`, error);
      throw error;
    }
  }

  /**
   * Single-prompt completion returning only the trimmed text
   */
  async generate(prompt: string, options?: AICompletionOptions): Promise<string> {
    const { content } = await this.generateCompletion([SessionMessageDto.user(prompt)], options);
    const text = content.trim();
    if (!text) {
      throw new Error(AI_ERRORS.EMPTY_RESPONSE);
    }
    return text;
  }

  switchProvider(providerName: AIProviderType): boolean {
    const provider = this.providers.get(providerName);
    if (!provider?.isAvailable) {
      const reason = provider ? 'no credentials' : 'unknown provider';
      this.logger.warn(`Cannot switch to '${providerName}': ${reason}`);
      return false;
    }

    this.active = provider;
    this.logger.log(`Switched LLM provider to ${providerName}`);
    return true;
  }

  private selectProvider(): AIProvider {
    const requested = this.providers.get(this.configuredProvider);

    if (!requested) {
      this.logger.warn(`Unknown LLM provider '${this.configuredProvider}', using ${this.fallback.name}`);
      return this.fallback;
    }
    if (!requested.isAvailable) {
      this.logger.warn(
        `LLM provider '${this.configuredProvider}' has no credentials, using ${this.fallback.name}`,
      );
      return this.fallback;
    }
    return requested;
  }
}
