import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { logger } from '../../utils/logger';
import type { EscalationHub } from './escalationHub';

const log = logger.child('EscalationSocket');

const SESSION_PATH = /^\/ws\/chat\/([^/?#]+)\/?$/;

export const parseSessionPath = (url: string | undefined): string | null => {
  if (!url) return null;
  const pathname = url.split('?')[0] ?? '';
  const match = SESSION_PATH.exec(pathname);
  if (!match?.[1]) return null;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return null;
  }
};

const rawToString = (data: RawData): string => {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
};

/** Serves `/ws/chat/:sessionId` on the HTTP server; other upgrade paths are refused. */
export const attachEscalationHub = (server: Server, hub: EscalationHub) => {
  const wss = new WebSocketServer({ noServer: true });

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer) => {
    const sessionId = parseSessionPath(req.url);
    if (!sessionId) {
      socket.write('HTTP/1.1 404 Not Found\r\n\r\n');
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => {
      onConnection(ws, sessionId);
    });
  };

  const onConnection = (ws: WebSocket, sessionId: string) => {
    // Frames are handled one at a time so a message stored before a broadcast keeps its order.
    let queue: Promise<void> = hub.connect(sessionId, ws).catch((error: unknown) => {
      log.error('Failed to announce escalation state', { sessionId, error });
    });

    ws.on('message', (data) => {
      const raw = rawToString(data);
      queue = queue
        .then(() => hub.handleFrame(sessionId, ws, raw))
        .catch((error: unknown) => {
          log.error('Live chat frame failed', { sessionId, error });
          hub.sendServerError(ws);
        });
    });

    ws.on('close', () => {
      hub.disconnect(sessionId, ws);
      log.info('Socket left conversation', { sessionId });
    });

    ws.on('error', (error) => {
      log.warn('Socket error', { sessionId, error: error.message });
    });
  };

  server.on('upgrade', onUpgrade);

  return {
    close: () => new Promise<void>((resolve) => {
      server.off('upgrade', onUpgrade);
      for (const client of wss.clients) client.terminate();
      wss.close(() => resolve());
    }),
  };
};
