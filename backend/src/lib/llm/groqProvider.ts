import OpenAI from 'openai';
import { logger } from '../../utils/logger';
import type { LlmMessage, LlmProvider, LlmStreamOptions } from './types';

const log = logger.child('GroqProvider');

type GroqProviderOptions = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  requestTimeoutMs: number;
};

/** Groq exposes an OpenAI-compatible API, so the OpenAI SDK talks to it directly. */
export class GroqProvider implements LlmProvider {
  readonly name = 'groq' as const;
  private client?: OpenAI;

  constructor(private readonly options: GroqProviderOptions) {}

  isConfigured(): boolean {
    return !!this.options.apiKey;
  }

  async *streamChat(messages: LlmMessage[], options: LlmStreamOptions): AsyncGenerator<string> {
    const client = this.getClient();
    const startedAt = Date.now();

    const stream = await client.chat.completions.create({
      model: this.options.model,
      messages,
      temperature: options.temperature,
      max_tokens: options.maxTokens,
      stream: true,
    }, { signal: options.signal });

    let chunkCount = 0;
    for await (const chunk of stream) {
      const content = chunk.choices[0]?.delta?.content || '';
      if (!content) continue;
      chunkCount++;
      yield content;
    }

    log.debug('Groq stream finished', {
      model: this.options.model,
      chunkCount,
      latencyMs: Date.now() - startedAt,
    });
  }

  private getClient() {
    if (this.client) return this.client;
    if (!this.options.apiKey) throw new Error('Groq API key not configured');

    this.client = new OpenAI({
      apiKey: this.options.apiKey,
      baseURL: this.options.baseUrl,
      timeout: this.options.requestTimeoutMs,
      maxRetries: 0,
    });
    return this.client;
  }
}
