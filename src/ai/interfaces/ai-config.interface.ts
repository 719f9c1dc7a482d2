export type AIProviderType = 'mock' | 'openai' | 'groq';

export interface ChatCompletionsSettings {
  apiKey?: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  temperature: number;
}
