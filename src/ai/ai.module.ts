import { Global, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AIService } from './ai.service';
import { MockAIProvider } from './providers/mock-ai.provider';
import { OpenAIProvider } from './providers/openai.provider';
import { GroqProvider } from './providers/groq.provider';

/**
 * LLM access, used by the memory module for conversation summaries
 */
@Global()
@Module({
  imports: [ConfigModule],
  providers: [MockAIProvider, OpenAIProvider, GroqProvider, AIService],
  exports: [AIService],
})
export class AIModule {}
