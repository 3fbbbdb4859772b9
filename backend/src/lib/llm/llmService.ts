import { logger } from '../../utils/logger';
import type { LlmMessage, LlmProvider, LlmStreamOptions } from './types';

const log = logger.child('LlmService');

export class NoLlmProviderError extends Error {
  constructor() {
    super('No LLM provider is configured');
    this.name = 'NoLlmProviderError';
  }
}

/**
 * Streams from the first configured provider. A provider that fails before
 * producing any text hands over to the next one; once text has reached the
 * caller the failure propagates, since a second model cannot continue the
 * first one's sentence.
 */
export class LlmService {
  constructor(private readonly providers: LlmProvider[]) {}

  hasConfiguredProvider(): boolean {
    return this.providers.some((provider) => provider.isConfigured());
  }

  configuredProviderNames(): string[] {
    return this.providers.filter((provider) => provider.isConfigured()).map((provider) => provider.name);
  }

  async *stream(messages: LlmMessage[], options: LlmStreamOptions): AsyncGenerator<string> {
    let lastError: unknown = null;

    for (const provider of this.providers) {
      if (!provider.isConfigured()) continue;

      let yielded = false;
      try {
        for await (const text of provider.streamChat(messages, options)) {
          yielded = true;
          yield text;
        }
        return;
      } catch (error) {
        if (yielded || options.signal?.aborted) throw error;
        lastError = error;
        log.warn(`Provider ${provider.name} failed before streaming; trying next`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    throw lastError ?? new NoLlmProviderError();
  }
}
