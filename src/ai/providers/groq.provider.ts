import { Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ChatCompletionsProvider } from './chat-completions.provider';
import { AI_DEFAULTS } from '../constants/ai.constants';
import { readNumber, readString } from '../../config/config.utils';

/**
 * Groq Provider
 *
 * Free tier, low latency. Models: llama-3.1-8b-instant, llama-3.3-70b-versatile
 */
@Injectable()
export class GroqProvider extends ChatCompletionsProvider {
  readonly name = 'groq';
  protected readonly logger = new Logger(GroqProvider.name);

  constructor(@Optional() configService?: ConfigService) {
    super({
      apiKey: readString(configService, 'GROQ_API_KEY'),
      baseUrl: 'https://api.groq.com/openai/v1',
      model: readString(configService, 'GROQ_MODEL', AI_DEFAULTS.GROQ_MODEL) ?? AI_DEFAULTS.GROQ_MODEL,
      maxTokens: readNumber(configService, 'GROQ_MAX_TOKENS', AI_DEFAULTS.MAX_TOKENS),
      temperature: readNumber(configService, 'GROQ_TEMPERATURE', AI_DEFAULTS.TEMPERATURE),
    });

    if (this.isAvailable) {
      this.logger.log(`Groq provider initialized with model: ${this.model}`);
    } else {
      this.logger.warn('Groq API key not configured. Provider will be unavailable.');
    }
  }
}
