export type LlmMessage = {
  role: 'system' | 'user' | 'assistant';
  content: string;
};

export type LlmStreamOptions = {
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
};

export type LlmProviderName = 'groq' | 'ollama';

export interface LlmProvider {
  readonly name: LlmProviderName;
  isConfigured(): boolean;
  /** Yields text fragments in arrival order. */
  streamChat(messages: LlmMessage[], options: LlmStreamOptions): AsyncIterable<string>;
}
