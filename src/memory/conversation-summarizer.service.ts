import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AIService } from '../ai/ai.service';
import { SummaryCache, SummaryCacheMetrics } from './utils/summary-cache';
import { SummaryConfig } from './interfaces/memory-config.interface';
import { loadSummaryConfig } from './memory.config';
import { MEMORY_DEFAULTS } from './memory.constants';
import { MessageRole, SessionMessageDto } from '../session/dto/session-message.dto';
import { CLOCK, Clock, systemClock } from '../common/clock/clock';
import { errorMessage } from '../common/utils/async.utils';

interface SummaryTicket {
  readonly sessionId: string;
  discarded: boolean;
}

interface InFlightSummary {
  ticket: SummaryTicket;
  request: Promise<string>;
}

/**
 * Condenses the older part of a conversation with the LLM.
 *
 * Results are cached per (sessionId, turnCount). Concurrent requests for
 * the same key share one LLM call. When the LLM fails a heuristic line is
 * returned and nothing is cached, so the next request tries again.
 *
 * `forgetSession` discards the session's pending calls: they still answer
 * their callers but never reach the cache.
 */
@Injectable()
export class ConversationSummarizerService {
  private readonly logger = new Logger(ConversationSummarizerService.name);
  private readonly config: SummaryConfig;
  private readonly cache: SummaryCache;
  private readonly inFlight = new Map<string, InFlightSummary>();

  constructor(
    private readonly aiService: AIService,
    @Optional() private readonly configService?: ConfigService,
    @Optional() @Inject(CLOCK) clock?: Clock,
  ) {
    this.config = loadSummaryConfig(this.configService);
    this.cache = new SummaryCache(
      this.config.cacheMaxSize,
      this.config.cacheTtlMs,
      clock ?? systemClock,
    );
  }

  async summarize(
    sessionId: string,
    turnCount: number,
    messages: SessionMessageDto[],
  ): Promise<string> {
    const cached = this.cache.get(sessionId, turnCount);
    if (cached !== undefined) {
      this.logger.debug(`Summary cache hit: ${SummaryCache.keyFor(sessionId, turnCount)}`);
      return cached;
    }

    const key = SummaryCache.keyFor(sessionId, turnCount);
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending.request;
    }

    const ticket: SummaryTicket = { sessionId, discarded: false };
    const request = this.generate(turnCount, messages, ticket).finally(() => {
      if (this.inFlight.get(key)?.request === request) {
        this.inFlight.delete(key);
      }
    });
    this.inFlight.set(key, { ticket, request });
    return request;
  }

  forgetSession(sessionId: string): void {
    this.cache.forgetSession(sessionId);

    for (const [key, { ticket }] of this.inFlight) {
      if (ticket.sessionId === sessionId) {
        ticket.discarded = true;
        this.inFlight.delete(key);
      }
    }
  }

  getCacheMetrics(): SummaryCacheMetrics {
    return this.cache.getMetrics();
  }

  clear(): void {
    this.cache.clear();
    for (const { ticket } of this.inFlight.values()) {
      ticket.discarded = true;
    }
    this.inFlight.clear();
  }

  private async generate(
    turnCount: number,
    messages: SessionMessageDto[],
    ticket: SummaryTicket,
  ): Promise<string> {
    const { sessionId } = ticket;
    this.logger.debug(
      `Summarizing ${messages.length} messages of session ${sessionId}`,
    );

    try {
      const summary = await this.aiService.generate(this.buildPrompt(messages), {
        model: this.config.model,
        temperature: MEMORY_DEFAULTS.SUMMARY_TEMPERATURE,
        maxTokens: MEMORY_DEFAULTS.SUMMARY_MAX_TOKENS,
      });
      if (ticket.discarded) {
        this.logger.debug(`Discarding summary of ${sessionId}: conversation changed meanwhile`);
      } else {
        this.cache.set(sessionId, turnCount, summary);
      }
      return summary;
    } catch (error) {
      this.logger.error(
        `Summary generation failed for ${sessionId}, using fallback: ${errorMessage(error)}`,
      );
      return ConversationSummarizerService.fallbackSummary(messages);
    }
  }

  private buildPrompt(messages: SessionMessageDto[]): string {
    const transcript = messages
      .map((m) => `${m.role === MessageRole.USER ? 'User' : 'Assistant'}: ${m.content}`)
      .join('\n');

    return [
      'Summarize the conversation below in 2-3 concise sentences.',
      'Focus on the main topics and on what the user wanted to know.',
      '',
      'Conversation:',
      transcript,
      '',
      'Summary:',
    ].join('\n');
  }

  static fallbackSummary(messages: SessionMessageDto[]): string {
    const firstQuestion = messages.find((m) => m.role === MessageRole.USER);
    if (!firstQuestion) {
      return 'Earlier conversation';
    }
    const topic = firstQuestion.content.slice(0, MEMORY_DEFAULTS.FALLBACK_TOPIC_LENGTH);
    return `User asked about: "${topic}..."`;
  }
}
