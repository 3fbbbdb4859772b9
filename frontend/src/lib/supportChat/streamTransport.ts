import { ChatRequestError, isLikelyNetworkError } from './errors';
import type { ByteReader } from './streamDecoder';

export type ChatStreamPayload = {
  message: string;
  session_id: string;
  origin: string;
  agent_id?: number;
};

export interface StreamTransport {
  open(payload: ChatStreamPayload, signal: AbortSignal): Promise<ByteReader>;
}

const parseErrorPayload = (raw: string) => {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  try {
    const parsed: unknown = JSON.parse(trimmed);
    if (parsed && typeof parsed === 'object') {
      if ('error' in parsed && typeof parsed.error === 'string') return parsed.error;
      if ('message' in parsed && typeof parsed.message === 'string') return parsed.message;
    }
  } catch {
    return trimmed;
  }
  return trimmed;
};

export class FetchStreamTransport implements StreamTransport {
  constructor(
    private readonly baseUrl: string,
    private readonly fetchImpl?: typeof fetch,
  ) {}

  async open(payload: ChatStreamPayload, signal: AbortSignal): Promise<ByteReader> {
    // Called unbound: `window.fetch` throws when invoked as a method of another object.
    const doFetch = this.fetchImpl ?? fetch;
    let response: Response;
    try {
      response = await doFetch(`${this.baseUrl.replace(/\/$/, '')}/api/v1/chat/stream`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'text/event-stream',
        },
        body: JSON.stringify(payload),
        signal,
      });
    } catch (error) {
      if (signal.aborted) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new ChatRequestError(isLikelyNetworkError(message) ? message : `Network error: ${message}`);
    }

    if (!response.ok) {
      const fallback = `Request failed with status ${response.status}`;
      const detail = await response.text().then(parseErrorPayload, () => null);
      throw new ChatRequestError(detail ?? fallback, response.status);
    }
    if (!response.body) throw new ChatRequestError('Empty response body', response.status);

    return response.body.getReader();
  }
}
