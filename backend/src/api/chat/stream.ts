import type { Response } from 'express';
import { z } from 'zod';
import { getServices } from '../../core';
import { formatFrame, isTerminalEvent, STREAM_END_FRAME, type ServerStreamEvent } from '../../lib/chat/streamEvents';
import { REPLIES } from '../../lib/chat/chatStreamService';
import { logger } from '../../utils/logger';
import { registerRoute } from '../../utils/routesRegistry';

const log = logger.child('api/chat/stream');

const ChatStreamBodySchema = z.object({
  message: z.string().trim().min(1, 'message is required').max(4000),
  session_id: z.string().trim().min(1, 'session_id is required').max(200),
  origin: z.string().trim().min(1).max(100).default('web'),
  agent_id: z.coerce.number().int().positive().nullish(),
});

type FrameSink = Pick<Response, 'write'>;

/**
 * Writes events as `data:` frames until the first terminal one. A failure of the
 * producer becomes an `error` frame unless a terminal frame already went out.
 */
export const pipeEvents = async (
  events: AsyncIterable<ServerStreamEvent>,
  sink: FrameSink,
  sessionId: string,
  isClosed: () => boolean,
) => {
  let terminated = false;
  try {
    for await (const event of events) {
      if (isClosed()) return;
      sink.write(formatFrame(event));
      if (isTerminalEvent(event)) {
        terminated = true;
        break;
      }
    }
  } catch (error) {
    log.error('Chat stream failed', { sessionId, error });
    if (!terminated && !isClosed()) {
      sink.write(formatFrame({ type: 'error', content: REPLIES.internalError, code: 'internal_error', session_id: sessionId }));
      terminated = true;
    }
  }

  if (!isClosed()) sink.write(STREAM_END_FRAME);
};

registerRoute('post', '/api/v1/chat/stream', async (req, res) => {
  const parsed = ChatStreamBodySchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({ ok: false, error: parsed.error.issues[0]?.message ?? 'Invalid request body' });
    return;
  }
  const body = parsed.data;

  res.writeHead(200, {
    'Content-Type': 'text/event-stream',
    'Cache-Control': 'no-cache',
    Connection: 'keep-alive',
    'X-Accel-Buffering': 'no',
  });
  res.flushHeaders();

  const controller = new AbortController();
  let closed = false;
  res.on('close', () => {
    closed = true;
    controller.abort();
  });

  const { chatStream } = getServices();
  await pipeEvents(
    chatStream.stream({
      message: body.message,
      sessionId: body.session_id,
      origin: body.origin,
      agentId: body.agent_id ?? undefined,
      signal: controller.signal,
    }),
    res,
    body.session_id,
    () => closed,
  );

  if (!closed) res.end();
});
