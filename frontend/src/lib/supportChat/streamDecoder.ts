import { logger } from '../../helpers/logger';
import { STREAM_EVENT_TYPES, StreamEventSchema, type StreamEvent } from './types';

const log = logger.child('decoder');

const DATA_PREFIX = 'data: ';
const END_MARKER = '[DONE]';

/** The slice of a `ReadableStreamDefaultReader` the decoder uses. */
export interface ByteReader {
  read(): Promise<{ done: boolean; value?: Uint8Array }>;
  cancel(reason?: unknown): Promise<void>;
}

type ParseMode = 'strict' | 'lenient';

/**
 * Line framing for `data: <json>` streams. Holds the unterminated tail of the
 * text seen so far; feeding the same text to two parsers yields the same events.
 */
export class FrameParser {
  private buffer = '';

  push(text: string): StreamEvent[] {
    this.buffer += text;
    const lines = this.buffer.split('\n');
    this.buffer = lines.pop() ?? '';

    const events: StreamEvent[] = [];
    for (const line of lines) {
      const event = this.parseLine(line, 'strict');
      if (event) events.push(event);
    }
    return events;
  }

  /** Best-effort parse of whatever is left once the source has ended. */
  flush(): StreamEvent[] {
    const rest = this.buffer;
    this.buffer = '';
    if (!rest.trim()) return [];
    const event = this.parseLine(rest, 'lenient');
    return event ? [event] : [];
  }

  private parseLine(rawLine: string, mode: ParseMode): StreamEvent | null {
    const line = rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine;
    if (!line.startsWith(DATA_PREFIX)) return null;

    const payload = line.slice(DATA_PREFIX.length).trim();
    if (!payload || payload === END_MARKER) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(payload);
    } catch (error) {
      if (mode === 'strict') log.warn('Skipping malformed frame', { preview: payload.slice(0, 80), error });
      return null;
    }

    const parsed = StreamEventSchema.safeParse(raw);
    if (parsed.success) return parsed.data;

    if (mode === 'strict') {
      const type = typeof raw === 'object' && raw !== null && 'type' in raw ? String(raw.type) : '';
      if (STREAM_EVENT_TYPES.has(type)) {
        log.warn(`Rejected invalid "${type}" frame`, parsed.error.issues);
      } else {
        log.warn(`Rejected frame with unknown type "${type}"`);
      }
    }
    return null;
  }
}

export type DecodeOptions = {
  signal?: AbortSignal;
  /** Called for every chunk, before it is parsed. */
  onChunk?: () => void;
};

/**
 * Lazily turns a byte stream into events, in order. Stops when the source ends
 * or the signal aborts; a consumer that stops early cancels the source.
 */
export async function* decodeStream(reader: ByteReader, options: DecodeOptions = {}): AsyncGenerator<StreamEvent> {
  const decoder = new TextDecoder('utf-8');
  const parser = new FrameParser();
  const { signal } = options;
  let finished = false;

  const cancel = () => {
    reader.cancel().catch((error: unknown) => log.debug('Reader cancel failed', error));
  };
  signal?.addEventListener('abort', cancel, { once: true });

  try {
    if (signal?.aborted) return;

    while (true) {
      const { done, value } = await reader.read();
      if (done) break;
      if (!value) continue;
      options.onChunk?.();
      yield* parser.push(decoder.decode(value, { stream: true }));
    }
    finished = true;

    if (signal?.aborted) return;
    yield* parser.push(decoder.decode());
    yield* parser.flush();
  } finally {
    signal?.removeEventListener('abort', cancel);
    if (!finished && !signal?.aborted) cancel();
  }
}
