import { z } from 'zod';
import { logger } from '../../utils/logger';
import type { ConversationRepository, MessageRole } from '../conversations/conversationRepository';
import type { EscalationDetector } from './escalationDetector';

const log = logger.child('EscalationHub');

const OPEN = 1;

/** The part of a `ws` WebSocket the hub relies on. */
export interface HubSocket {
  readonly readyState: number;
  send(data: string): void;
}

const InboundFrameSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('join'),
    user_name: z.string().optional(),
    user_id: z.number().int().optional(),
    role: z.enum(['user', 'human_agent']).optional(),
  }),
  z.object({
    type: z.literal('message'),
    content: z.string(),
    user_name: z.string().optional(),
    user_id: z.number().int().optional(),
  }),
  z.object({
    type: z.literal('typing'),
    is_typing: z.boolean().default(true),
    user_name: z.string().optional(),
    user_id: z.number().int().optional(),
  }),
  z.object({
    type: z.literal('end'),
    user_id: z.number().int().optional(),
  }),
]);

type InboundFrame = z.infer<typeof InboundFrameSchema>;

export type OutboundFrame =
  | {
    type: 'message';
    role: Extract<MessageRole, 'user' | 'human_agent'>;
    content: string;
    user_id: number | null;
    user_name: string | null;
    timestamp: string;
  }
  | { type: 'typing'; user_name: string; is_typing: boolean; role: 'user' | 'human_agent' }
  | { type: 'user_joined'; user_name: string; user_id: number | null; role: 'user' | 'human_agent' }
  | { type: 'escalamiento_info'; escalated: true; user_id: number | null; user_name: string }
  | { type: 'finalizacion_escalamiento'; role: 'system'; content: string; timestamp: string }
  | { type: 'error'; content: string; timestamp: string };

export const HUB_REPLIES = {
  escalationEnded: 'You are back with the virtual assistant. Your next messages will be answered automatically.',
  endFailed: 'The live chat could not be ended. Please try again.',
  invalidFrame: 'Invalid message format.',
  serverError: 'Live chat server error.',
} as const;

const DEFAULT_USER_NAME = 'User';
const DEFAULT_STAFF_NAME = 'Staff member';

/**
 * Live channel for escalated conversations: one room per session id. Widget users
 * and staff share the room; everything said is stored and broadcast to the room.
 */
export class EscalationHub {
  private readonly rooms = new Map<string, Set<HubSocket>>();

  constructor(
    private readonly repository: ConversationRepository,
    private readonly detector: EscalationDetector,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async connect(sessionId: string, socket: HubSocket): Promise<void> {
    const room = this.rooms.get(sessionId) ?? new Set<HubSocket>();
    room.add(socket);
    this.rooms.set(sessionId, room);

    const conversation = await this.repository.findBySession(sessionId);
    if (conversation?.status === 'escalated' && conversation.escalatedTo) {
      this.sendTo(socket, {
        type: 'escalamiento_info',
        escalated: true,
        user_id: conversation.escalatedTo.userId,
        user_name: conversation.escalatedTo.userName,
      });
      log.info('Socket joined escalated conversation', {
        sessionId,
        staff: conversation.escalatedTo.userName,
      });
    } else {
      log.info('Socket joined conversation', { sessionId });
    }
  }

  disconnect(sessionId: string, socket: HubSocket) {
    const room = this.rooms.get(sessionId);
    if (!room) return;
    room.delete(socket);
    if (room.size === 0) this.rooms.delete(sessionId);
  }

  connectionCount(sessionId: string): number {
    return this.rooms.get(sessionId)?.size ?? 0;
  }

  async handleFrame(sessionId: string, socket: HubSocket, raw: string): Promise<void> {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch {
      log.warn('Dropping non-JSON frame', { sessionId });
      this.sendTo(socket, { type: 'error', content: HUB_REPLIES.invalidFrame, timestamp: this.timestamp() });
      return;
    }

    const parsed = InboundFrameSchema.safeParse(data);
    if (!parsed.success) {
      log.warn('Dropping unknown or malformed frame', { sessionId, issues: parsed.error.issues.length });
      return;
    }

    await this.dispatch(sessionId, socket, parsed.data);
  }

  private async dispatch(sessionId: string, socket: HubSocket, frame: InboundFrame) {
    switch (frame.type) {
      case 'join': {
        const role = frame.role ?? (frame.user_id !== undefined ? 'human_agent' : 'user');
        this.broadcast(sessionId, {
          type: 'user_joined',
          user_name: frame.user_name ?? DEFAULT_USER_NAME,
          user_id: frame.user_id ?? null,
          role,
        });
        return;
      }
      case 'typing':
        this.broadcast(sessionId, {
          type: 'typing',
          user_name: frame.user_name ?? DEFAULT_USER_NAME,
          is_typing: frame.is_typing,
          role: frame.user_id !== undefined ? 'human_agent' : 'user',
        });
        return;
      case 'message':
        await this.handleMessage(sessionId, socket, frame);
        return;
      case 'end':
        // Only the widget user hands the conversation back.
        if (frame.user_id !== undefined) {
          log.warn('Ignoring end frame from staff', { sessionId, userId: frame.user_id });
          return;
        }
        await this.endEscalation(sessionId, socket);
        return;
    }
  }

  private async handleMessage(
    sessionId: string,
    socket: HubSocket,
    frame: Extract<InboundFrame, { type: 'message' }>,
  ) {
    const content = frame.content.trim();
    if (!content) {
      log.warn('Ignoring empty message', { sessionId });
      return;
    }

    const fromStaff = frame.user_id !== undefined;

    if (!fromStaff && this.detector.wantsToEndEscalation(content)) {
      await this.endEscalation(sessionId, socket);
      return;
    }

    const role = fromStaff ? 'human_agent' : 'user';
    const userName = fromStaff ? frame.user_name || DEFAULT_STAFF_NAME : null;

    try {
      await this.repository.appendMessage(sessionId, {
        role,
        content,
        ...(fromStaff ? { userId: frame.user_id, userName: userName ?? DEFAULT_STAFF_NAME } : {}),
      });
    } catch (error) {
      log.error('Failed to store live message', { sessionId, error });
    }

    this.broadcast(sessionId, {
      type: 'message',
      role,
      content,
      user_id: fromStaff ? frame.user_id ?? null : null,
      user_name: userName,
      timestamp: this.timestamp(),
    });
  }

  private async endEscalation(sessionId: string, socket: HubSocket) {
    try {
      const conversation = await this.repository.findBySession(sessionId);
      if (!conversation) throw new Error(`Conversation not found: ${sessionId}`);

      await this.repository.update(sessionId, { status: 'active', escalatedTo: null });
      await this.repository.appendMessage(sessionId, { role: 'system', content: HUB_REPLIES.escalationEnded });
      log.info('Escalation ended by user', { sessionId });

      this.sendTo(socket, {
        type: 'finalizacion_escalamiento',
        role: 'system',
        content: HUB_REPLIES.escalationEnded,
        timestamp: this.timestamp(),
      });
    } catch (error) {
      log.error('Failed to end escalation', { sessionId, error });
      this.sendTo(socket, { type: 'error', content: HUB_REPLIES.endFailed, timestamp: this.timestamp() });
    }
  }

  broadcast(sessionId: string, frame: OutboundFrame) {
    const room = this.rooms.get(sessionId);
    if (!room) return;

    for (const socket of [...room]) {
      if (!this.sendTo(socket, frame)) {
        log.debug('Dropping dead socket', { sessionId });
        this.disconnect(sessionId, socket);
      }
    }
  }

  sendServerError(socket: HubSocket) {
    this.sendTo(socket, { type: 'error', content: HUB_REPLIES.serverError, timestamp: this.timestamp() });
  }

  private sendTo(socket: HubSocket, frame: OutboundFrame): boolean {
    if (socket.readyState !== OPEN) return false;
    try {
      socket.send(JSON.stringify(frame));
      return true;
    } catch (error) {
      log.warn('Socket send failed', { error });
      return false;
    }
  }

  private timestamp() {
    return this.now().toISOString();
  }
}
