import type { ChannelFactory, ChannelHandlers, ChannelSocket } from '../lib/supportChat/escalationChannel';
import type { ByteReader } from '../lib/supportChat/streamDecoder';
import type { ChatStreamPayload, StreamTransport } from '../lib/supportChat/streamTransport';
import type { ChannelFrame, KeyValueStore } from '../lib/supportChat/types';

const encoder = new TextEncoder();

export const sse = (...events: object[]) => events.map((event) => `data: ${JSON.stringify(event)}\n\n`).join('');

type ReadResult = { done: boolean; value?: Uint8Array };

/**
 * Serves the given chunks, then ends; with `hang` it waits until cancelled
 * instead of ending, with `failWith` it rejects.
 */
export class FakeReader implements ByteReader {
  cancelled = false;
  private index = 0;
  private pending: ((result: ReadResult) => void) | null = null;

  constructor(
    private readonly chunks: Array<string | Uint8Array>,
    private readonly options: { hang?: boolean; failWith?: Error } = {},
  ) {}

  read(): Promise<ReadResult> {
    if (this.cancelled) return Promise.resolve({ done: true });
    if (this.index < this.chunks.length) {
      const chunk = this.chunks[this.index++];
      return Promise.resolve({ done: false, value: typeof chunk === 'string' ? encoder.encode(chunk) : chunk });
    }
    if (this.options.failWith) return Promise.reject(this.options.failWith);
    if (!this.options.hang) return Promise.resolve({ done: true });
    return new Promise((resolve) => {
      this.pending = resolve;
    });
  }

  async cancel(): Promise<void> {
    this.cancelled = true;
    this.pending?.({ done: true });
    this.pending = null;
  }
}

type TransportAttempt = ByteReader | Error | ((signal: AbortSignal) => Promise<ByteReader>);

/** Answers the n-th `open` with the n-th attempt; the last one repeats. */
export class FakeTransport implements StreamTransport {
  readonly payloads: ChatStreamPayload[] = [];

  constructor(private readonly attempts: TransportAttempt[]) {}

  async open(payload: ChatStreamPayload, signal: AbortSignal): Promise<ByteReader> {
    this.payloads.push(payload);
    const attempt = this.attempts[Math.min(this.payloads.length, this.attempts.length) - 1];
    if (attempt === undefined) throw new Error('FakeTransport has no attempts');
    if (attempt instanceof Error) throw attempt;
    if (typeof attempt === 'function') return attempt(signal);
    return attempt;
  }
}

/** Never settles until the signal aborts, then rejects with its reason. */
export const pendingUntilAborted = (signal: AbortSignal) => new Promise<ByteReader>((_resolve, reject) => {
  signal.addEventListener('abort', () => reject(signal.reason), { once: true });
});

export class MemoryStorage implements KeyValueStore {
  readonly values = new Map<string, string>();
  failing = false;

  get(key: string) {
    if (this.failing) throw new Error('storage disabled');
    return this.values.get(key) ?? null;
  }

  set(key: string, value: string) {
    if (this.failing) throw new Error('storage disabled');
    this.values.set(key, value);
  }
}

/** Stands in for the live chat: records what the controller sends and lets tests push frames. */
export class FakeLiveChat {
  readonly opened: string[] = [];
  readonly sent: string[] = [];
  readonly typing: boolean[] = [];
  closed = 0;
  ended = 0;
  connected = true;
  private handlers: ChannelHandlers | null = null;

  readonly factory: ChannelFactory = (sessionId, handlers) => {
    this.opened.push(sessionId);
    this.handlers = handlers;
    return {
      send: (text) => {
        if (!this.connected) return false;
        this.sent.push(text);
        return true;
      },
      sendTyping: (isTyping) => {
        this.typing.push(isTyping);
      },
      end: () => {
        this.ended += 1;
        return this.connected;
      },
      close: () => {
        this.closed += 1;
      },
    };
  };

  emit(frame: ChannelFrame) {
    this.handlers?.onFrame(frame);
  }

  drop() {
    this.handlers?.onClose();
  }
}

export class FakeChannelSocket implements ChannelSocket {
  readyState = 0;
  readonly sent: string[] = [];
  closed = false;
  private readonly listeners = {
    open: [] as Array<() => void>,
    message: [] as Array<(data: unknown) => void>,
    close: [] as Array<() => void>,
    error: [] as Array<() => void>,
  };

  send(data: string) {
    this.sent.push(data);
  }

  close() {
    this.closed = true;
    this.readyState = 3;
  }

  onOpen(listener: () => void) {
    this.listeners.open.push(listener);
  }

  onMessage(listener: (data: unknown) => void) {
    this.listeners.message.push(listener);
  }

  onClose(listener: () => void) {
    this.listeners.close.push(listener);
  }

  onError(listener: () => void) {
    this.listeners.error.push(listener);
  }

  open() {
    this.readyState = 1;
    this.listeners.open.forEach((listener) => listener());
  }

  receive(data: unknown) {
    this.listeners.message.forEach((listener) => listener(data));
  }

  serverClose() {
    this.readyState = 3;
    this.listeners.close.forEach((listener) => listener());
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
