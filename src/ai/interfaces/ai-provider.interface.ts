import { SessionMessageDto } from '../../session/dto/session-message.dto';

export type CompletionFinishReason = 'stop' | 'length' | 'error';

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

/** Per-request overrides of a provider's configured defaults */
export interface AICompletionOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface AICompletionResult {
  content: string;
  finishReason: CompletionFinishReason;
  usage?: TokenUsage;
}

/**
 * A chat model the engine can summarize with. `isAvailable` is read on
 * every selection, so a provider may become usable after startup.
 */
export interface AIProvider {
  readonly name: string;
  readonly isAvailable: boolean;

  generateCompletion(
    messages: SessionMessageDto[],
    options?: AICompletionOptions,
  ): Promise<AICompletionResult>;
}
