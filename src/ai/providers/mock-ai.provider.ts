import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  AIProvider,
  AICompletionOptions,
  AICompletionResult,
} from '../interfaces/ai-provider.interface';
import { MessageRole, SessionMessageDto } from '../../session/dto/session-message.dto';
import { AI_DEFAULTS } from '../constants/ai.constants';
import { readNumber } from '../../config/config.utils';
import { delay } from '../../common/utils/async.utils';

const TOPIC_LENGTH = 60;

/**
 * Offline provider. Output is a pure function of the input so that
 * summaries stay stable across runs.
 */
@Injectable()
export class MockAIProvider implements AIProvider {
  readonly name = 'mock';
  readonly isAvailable = true;

  private readonly logger = new Logger(MockAIProvider.name);
  private readonly responseDelayMs: number;

  constructor(@Optional() private readonly configService?: ConfigService) {
    this.responseDelayMs = readNumber(
      this.configService,
      'AI_MOCK_RESPONSE_DELAY_MS',
      AI_DEFAULTS.MOCK_RESPONSE_DELAY_MS,
    );
  }

  async generateCompletion(
    messages: SessionMessageDto[],
    _options?: AICompletionOptions,
  ): Promise<AICompletionResult> {
    this.logger.debug(
      `Generating mock completion for ${messages.length} messages`,
    );

    if (this.responseDelayMs > 0) {
      await delay(this.responseDelayMs);
    }

    const content = this.generateMockResponse(this.getLastUserMessage(messages));
    const promptTokens = this.estimateTokens(messages.map((m) => m.content));
    const completionTokens = this.estimateTokens([content]);

    return {
      content,
      finishReason: 'stop',
      usage: {
        promptTokens,
        completionTokens,
        totalTokens: promptTokens + completionTokens,
      },
    };
  }

  private getLastUserMessage(messages: SessionMessageDto[]): string {
    for (let i = messages.length - 1; i >= 0; i--) {
      if (messages[i].role === MessageRole.USER) {
        return messages[i].content;
      }
    }
    return '';
  }

  /**
   * Prompts carrying a transcript ("User: ..." lines) get a summary of the
   * user's questions; anything else is acknowledged.
   */
  private generateMockResponse(prompt: string): string {
    const questions = prompt
      .split('\n')
      .filter((line) => line.startsWith('User: '))
      .map((line) => this.truncate(line.slice('User: '.length).trim()))
      .filter((line) => line.length > 0);

    if (questions.length > 0) {
      return `The user asked about: ${questions.join('; ')}.`;
    }

    const topic = this.truncate(prompt.trim());
    return topic ? `Acknowledged: ${topic}` : 'Acknowledged.';
  }

  private truncate(text: string): string {
    return text.length > TOPIC_LENGTH ? `${text.slice(0, TOPIC_LENGTH)}...` : text;
  }

  private estimateTokens(texts: string[]): number {
    // Rough estimation: ~4 characters per token
    const totalChars = texts.reduce((sum, text) => sum + text.length, 0);
    return Math.ceil(totalChars / 4);
  }
}
