import { Logger } from '@nestjs/common';
import {
  AIProvider,
  AICompletionOptions,
  AICompletionResult,
} from '../interfaces/ai-provider.interface';
import { ChatCompletionsSettings } from '../interfaces/ai-config.interface';
import { SessionMessageDto } from '../../session/dto/session-message.dto';
import { AI_ERRORS } from '../constants/ai.constants';

interface ChatCompletionsResponse {
  choices: Array<{
    message?: { content?: string | null };
    finish_reason?: string | null;
  }>;
  usage?: {
    prompt_tokens?: number;
    completion_tokens?: number;
    total_tokens?: number;
  };
}

function isChatCompletionsResponse(value: unknown): value is ChatCompletionsResponse {
  return (
    typeof value === 'object' &&
    value !== null &&
    'choices' in value &&
    Array.isArray(value.choices)
  );
}

/**
 * Base for providers speaking the OpenAI-compatible `/chat/completions`
 * protocol over fetch.
 */
export abstract class ChatCompletionsProvider implements AIProvider {
  abstract readonly name: string;
  protected abstract readonly logger: Logger;

  protected constructor(private readonly settings: ChatCompletionsSettings) {}

  get isAvailable(): boolean {
    return !!this.settings.apiKey;
  }

  get model(): string {
    return this.settings.model;
  }

  async generateCompletion(
    messages: SessionMessageDto[],
    options?: AICompletionOptions,
  ): Promise<AICompletionResult> {
    if (!this.isAvailable) {
      throw new Error(
        `${AI_ERRORS.PROVIDER_NOT_AVAILABLE}: ${this.name} API key not configured`,
      );
    }

    this.logger.debug(
      `Generating ${this.name} completion for ${messages.length} messages`,
    );

    try {
      const response = await fetch(`${this.settings.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.settings.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          model: options?.model ?? this.settings.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          max_tokens: Math.floor(options?.maxTokens ?? this.settings.maxTokens),
          temperature: options?.temperature ?? this.settings.temperature,
          stream: false,
        }),
      });

      if (!response.ok) {
        const error = await response.text();
        this.logger.error(`${this.name} API error: ${response.status} - ${error}`);
        throw new Error(`${this.name} API error: ${response.status}`);
      }

      const data: unknown = await response.json();
      if (!isChatCompletionsResponse(data)) {
        throw new Error(AI_ERRORS.INVALID_RESPONSE);
      }

      const choice = data.choices[0];
      return {
        content: choice?.message?.content ?? '',
        finishReason: choice?.finish_reason === 'length' ? 'length' : 'stop',
        usage: {
          promptTokens: data.usage?.prompt_tokens ?? 0,
          completionTokens: data.usage?.completion_tokens ?? 0,
          totalTokens: data.usage?.total_tokens ?? 0,
        },
      };
    } catch (error) {
      this.logger.error(`${this.name} completion failed`, error);
      throw error;
    }
  }
}
