import { LlmService, NoLlmProviderError } from '../../lib/llm/llmService';
import { OllamaProvider } from '../../lib/llm/ollamaProvider';
import { collect, FakeLlmProvider } from '../../testUtils/fakes';

const options = { temperature: 0.3, maxTokens: 100 };
const messages = [{ role: 'user' as const, content: 'hi' }];

describe('LlmService', () => {
  test('falls back when the primary fails before any text', async () => {
    const primary = new FakeLlmProvider({ name: 'groq', chunks: ['never'], failAfter: 0 });
    const fallback = new FakeLlmProvider({ name: 'ollama', chunks: ['Hel', 'lo'] });

    const text = await collect(new LlmService([primary, fallback]).stream(messages, options));

    expect(text).toEqual(['Hel', 'lo']);
    expect(fallback.calls).toHaveLength(1);
  });

  test('propagates a failure after text was produced', async () => {
    const primary = new FakeLlmProvider({ chunks: ['Hel', 'lo'], failAfter: 1, error: new Error('cut off') });
    const fallback = new FakeLlmProvider({ name: 'ollama', chunks: ['other'] });
    const received: string[] = [];

    await expect((async () => {
      for await (const text of new LlmService([primary, fallback]).stream(messages, options)) received.push(text);
    })()).rejects.toThrow('cut off');

    expect(received).toEqual(['Hel']);
    expect(fallback.calls).toHaveLength(0);
  });

  test('skips providers that are not configured', async () => {
    const service = new LlmService([
      new FakeLlmProvider({ configured: false, chunks: ['skipped'] }),
      new FakeLlmProvider({ name: 'ollama', chunks: ['used'] }),
    ]);
    expect(service.configuredProviderNames()).toEqual(['ollama']);
    expect(await collect(service.stream(messages, options))).toEqual(['used']);
  });

  test('fails when no provider is configured', async () => {
    const service = new LlmService([new FakeLlmProvider({ configured: false })]);
    expect(service.hasConfiguredProvider()).toBe(false);
    await expect(collect(service.stream(messages, options))).rejects.toBeInstanceOf(NoLlmProviderError);
  });
});

describe('OllamaProvider', () => {
  test('streams message content from newline-delimited JSON', async () => {
    const requests: Array<{ url: string; body: unknown }> = [];
    const provider = new OllamaProvider({
      enabled: true,
      baseUrl: 'http://ollama.test/',
      model: 'test-model',
      fetchImpl: async (input: string | URL | Request, init?: RequestInit) => {
        requests.push({ url: String(input), body: JSON.parse(String(init?.body)) });
        return new Response(
          '{"message":{"role":"assistant","content":"Hel"},"done":false}\n'
          + 'not json\n'
          + '{"message":{"role":"assistant","content":"lo"},"done":false}\n'
          + '{"done":true}',
        );
      },
    });

    expect(await collect(provider.streamChat(messages, options))).toEqual(['Hel', 'lo']);
    expect(requests).toEqual([{
      url: 'http://ollama.test/api/chat',
      body: {
        model: 'test-model',
        messages,
        stream: true,
        options: { temperature: 0.3, num_predict: 100 },
      },
    }]);
  });

  test('fails on an error status', async () => {
    const provider = new OllamaProvider({
      enabled: true,
      baseUrl: 'http://ollama.test',
      model: 'test-model',
      fetchImpl: async () => new Response('model not found', { status: 404 }),
    });
    await expect(collect(provider.streamChat(messages, options))).rejects.toThrow('Ollama request failed with status 404');
  });

  test('surfaces an error chunk', async () => {
    const provider = new OllamaProvider({
      enabled: true,
      baseUrl: 'http://ollama.test',
      model: 'test-model',
      fetchImpl: async () => new Response('{"error":"model is loading"}\n'),
    });
    await expect(collect(provider.streamChat(messages, options))).rejects.toThrow('Ollama error: model is loading');
  });
});
