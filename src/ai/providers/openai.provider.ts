import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatCompletionsProvider } from './chat-completions.provider';
import { AI_DEFAULTS } from '../constants/ai.constants';
import { readNumber, readString } from '../../config/config.utils';

/**
 * OpenAI Provider
 *
 * Enable with AI_PROVIDER=openai and OPENAI_API_KEY.
 */
@Injectable()
export class OpenAIProvider extends ChatCompletionsProvider {
  readonly name = 'openai';
  protected readonly logger = new Logger(OpenAIProvider.name);

  constructor(@Optional() configService?: ConfigService) {
    super({
      apiKey: readString(configService, 'OPENAI_API_KEY'),
      baseUrl: 'https://api.openai.com/v1',
      model:
        readString(configService, 'OPENAI_MODEL', AI_DEFAULTS.OPENAI_MODEL) ??
        AI_DEFAULTS.OPENAI_MODEL,
      maxTokens: readNumber(configService, 'OPENAI_MAX_TOKENS', AI_DEFAULTS.MAX_TOKENS),
      temperature: readNumber(configService, 'OPENAI_TEMPERATURE', AI_DEFAULTS.TEMPERATURE),
    });

    if (!this.isAvailable) {
      this.logger.warn('OpenAI API key not configured. Provider will be unavailable.');
    }
  }
}
