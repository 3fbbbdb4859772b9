import type { HubSocket } from '../lib/escalation/escalationHub';
import type { LlmMessage, LlmProvider, LlmProviderName } from '../lib/llm/types';

type FakeProviderOptions = {
  name?: LlmProviderName;
  chunks?: string[];
  /** Throw after this many chunks; 0 fails before the first one. */
  failAfter?: number;
  error?: Error;
  configured?: boolean;
};

export class FakeLlmProvider implements LlmProvider {
  readonly name: LlmProviderName;
  readonly calls: LlmMessage[][] = [];

  constructor(private readonly options: FakeProviderOptions = {}) {
    this.name = options.name ?? 'groq';
  }

  isConfigured() {
    return this.options.configured ?? true;
  }

  async *streamChat(messages: LlmMessage[]): AsyncGenerator<string> {
    this.calls.push(messages);
    const chunks = this.options.chunks ?? [];
    for (let i = 0; i < chunks.length; i++) {
      if (this.options.failAfter === i) throw this.options.error ?? new Error('provider failed');
      yield chunks[i] ?? '';
    }
    if (this.options.failAfter !== undefined && this.options.failAfter >= chunks.length) {
      throw this.options.error ?? new Error('provider failed');
    }
  }
}

export class FakeSocket implements HubSocket {
  readyState = 1;
  readonly sent: string[] = [];
  failOnSend = false;

  send(data: string) {
    if (this.failOnSend) throw new Error('socket closed');
    this.sent.push(data);
  }

  frames(): unknown[] {
    return this.sent.map((raw) => JSON.parse(raw));
  }
}

export const collect = async <T>(source: AsyncIterable<T>): Promise<T[]> => {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
};
