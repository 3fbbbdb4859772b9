import { z } from 'zod';
import { logger } from '../../utils/logger';
import type { LlmMessage, LlmProvider, LlmStreamOptions } from './types';

const log = logger.child('OllamaProvider');

type OllamaProviderOptions = {
  enabled: boolean;
  baseUrl: string;
  model: string;
  fetchImpl?: typeof fetch;
};

const OllamaChunkSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  done: z.boolean().optional(),
  error: z.string().optional(),
});

/** Local fallback: Ollama's /api/chat streams newline-delimited JSON objects. */
export class OllamaProvider implements LlmProvider {
  readonly name = 'ollama' as const;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: OllamaProviderOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  isConfigured(): boolean {
    return this.options.enabled;
  }

  async *streamChat(messages: LlmMessage[], options: LlmStreamOptions): AsyncGenerator<string> {
    const response = await this.fetchImpl(`${this.options.baseUrl.replace(/\/$/, '')}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: this.options.model,
        messages,
        stream: true,
        options: {
          temperature: options.temperature,
          num_predict: options.maxTokens,
        },
      }),
      signal: options.signal,
    });

    if (!response.ok || !response.body) {
      throw new Error(`Ollama request failed with status ${response.status}`);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = '';

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;
        buffer += decoder.decode(value, { stream: true });

        const lines = buffer.split('\n');
        buffer = lines.pop() ?? '';
        for (const line of lines) {
          const content = this.parseLine(line);
          if (content) yield content;
        }
      }

      const tail = this.parseLine(buffer + decoder.decode());
      if (tail) yield tail;
    } finally {
      reader.releaseLock();
    }
  }

  private parseLine(line: string): string {
    const trimmed = line.trim();
    if (!trimmed) return '';

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      log.warn('Skipping malformed Ollama chunk', { preview: trimmed.slice(0, 80) });
      return '';
    }

    const parsed = OllamaChunkSchema.safeParse(raw);
    if (!parsed.success) return '';
    if (parsed.data.error) throw new Error(`Ollama error: ${parsed.data.error}`);
    return parsed.data.message?.content ?? '';
  }
}
