import { logger } from '../../helpers/logger';
import { ChannelFrameSchema, type ChannelFrame } from './types';

const log = logger.child('live-chat');

const OPEN = 1;
const CONNECTING = 0;

/** What the channel needs from a WebSocket. */
export interface ChannelSocket {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
  onOpen(listener: () => void): void;
  onMessage(listener: (data: unknown) => void): void;
  onClose(listener: () => void): void;
  onError(listener: () => void): void;
}

export type ChannelHandlers = {
  onFrame: (frame: ChannelFrame) => void;
  onClose: () => void;
};

export interface LiveChannel {
  send(text: string): boolean;
  sendTyping(isTyping: boolean): void;
  /** Tells the hub the user is going back to the bot, then closes. False when the hub could not be told. */
  end(): boolean;
  close(): void;
}

export type ChannelFactory = (sessionId: string, handlers: ChannelHandlers) => LiveChannel;

export const liveChatUrl = (rootUrl: string, sessionId: string) =>
  `${rootUrl.replace(/\/$/, '').replace(/^http/, 'ws')}/ws/chat/${encodeURIComponent(sessionId)}`;

export const browserSocket = (url: string): ChannelSocket => {
  const ws = new WebSocket(url);
  return {
    get readyState() {
      return ws.readyState;
    },
    send: (data) => ws.send(data),
    close: () => ws.close(),
    onOpen: (listener) => ws.addEventListener('open', () => listener()),
    onMessage: (listener) => ws.addEventListener('message', (event) => listener(event.data)),
    onClose: (listener) => ws.addEventListener('close', () => listener()),
    onError: (listener) => ws.addEventListener('error', () => listener()),
  };
};

type EscalationChannelOptions = {
  userName?: string;
  createSocket?: (url: string) => ChannelSocket;
};

/**
 * Live chat for one escalated session. Joins on open, queues messages written
 * before the socket is open, and hands validated inbound frames to `onFrame`.
 */
export class EscalationChannel implements LiveChannel {
  private readonly socket: ChannelSocket;
  private readonly pending: string[] = [];
  private closedByUs = false;

  constructor(
    url: string,
    private readonly handlers: ChannelHandlers,
    private readonly options: EscalationChannelOptions = {},
  ) {
    this.socket = (options.createSocket ?? browserSocket)(url);
    this.socket.onOpen(() => this.handleOpen());
    this.socket.onMessage((data) => this.handleMessage(data));
    this.socket.onClose(() => this.handleClose());
    this.socket.onError(() => log.warn('Live chat socket error'));
  }

  send(text: string): boolean {
    return this.write({ type: 'message', content: text });
  }

  sendTyping(isTyping: boolean) {
    this.write({ type: 'typing', is_typing: isTyping, user_name: this.userName });
  }

  end(): boolean {
    const delivered = this.socket.readyState === OPEN;
    if (delivered) this.socket.send(JSON.stringify({ type: 'end' }));
    else log.warn('Live chat is not connected; leaving without ending the escalation');
    this.close();
    return delivered;
  }

  close() {
    this.closedByUs = true;
    this.pending.length = 0;
    this.socket.close();
  }

  private get userName() {
    return this.options.userName ?? 'User';
  }

  private write(frame: Record<string, unknown>): boolean {
    const data = JSON.stringify(frame);
    if (this.socket.readyState === OPEN) {
      this.socket.send(data);
      return true;
    }
    if (this.socket.readyState === CONNECTING && !this.closedByUs) {
      this.pending.push(data);
      return true;
    }
    log.warn('Live chat is not connected; frame dropped', { type: frame.type });
    return false;
  }

  private handleOpen() {
    this.socket.send(JSON.stringify({ type: 'join', user_name: this.userName, role: 'user' }));
    for (const data of this.pending.splice(0)) this.socket.send(data);
  }

  private handleMessage(data: unknown) {
    if (typeof data !== 'string') {
      log.warn('Ignoring binary live chat frame');
      return;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      log.warn('Ignoring malformed live chat frame', error);
      return;
    }

    const parsed = ChannelFrameSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('Ignoring unknown live chat frame', parsed.error.issues);
      return;
    }
    this.handlers.onFrame(parsed.data);
  }

  private handleClose() {
    if (this.closedByUs) return;
    log.info('Live chat closed by the server');
    this.handlers.onClose();
  }
}

export const escalationChannelFactory = (rootUrl: string, options: EscalationChannelOptions = {}): ChannelFactory =>
  (sessionId, handlers) => new EscalationChannel(liveChatUrl(rootUrl, sessionId), handlers, options);
