import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ConversationMemoryService } from './conversation-memory.service';
import { ConversationSummarizerService } from './conversation-summarizer.service';

@Module({
  imports: [ConfigModule],
  providers: [ConversationSummarizerService, ConversationMemoryService],
  exports: [ConversationMemoryService, ConversationSummarizerService],
})
export class MemoryModule {}
