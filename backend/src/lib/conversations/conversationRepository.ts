import { randomUUID } from 'node:crypto';

export type ConversationStatus = 'active' | 'escalated' | 'closed';

export type MessageRole = 'user' | 'bot' | 'human_agent' | 'system';

export type StoredMessage = {
  id: string;
  role: MessageRole;
  content: string;
  createdAt: Date;
  agentId?: number;
  userId?: number;
  userName?: string;
};

export type Conversation = {
  sessionId: string;
  origin: string;
  agentId: number | null;
  status: ConversationStatus;
  escalatedTo: { userId: number | null; userName: string } | null;
  previousSessionId: string | null;
  messages: StoredMessage[];
  createdAt: Date;
  updatedAt: Date;
};

export type CreateConversationInput = {
  sessionId: string;
  origin: string;
  agentId?: number | null;
  status?: ConversationStatus;
  escalatedTo?: Conversation['escalatedTo'];
  previousSessionId?: string | null;
};

export type ConversationUpdate = Partial<Pick<Conversation, 'status' | 'agentId' | 'escalatedTo'>>;

/**
 * Persistence boundary for conversations. The service layer only talks to this
 * interface; swapping in a database-backed implementation needs no other change.
 */
export interface ConversationRepository {
  findBySession(sessionId: string): Promise<Conversation | null>;
  create(input: CreateConversationInput): Promise<Conversation>;
  appendMessage(sessionId: string, message: Omit<StoredMessage, 'id' | 'createdAt'>): Promise<StoredMessage>;
  update(sessionId: string, update: ConversationUpdate): Promise<Conversation>;
}

export class InMemoryConversationRepository implements ConversationRepository {
  private readonly conversations = new Map<string, Conversation>();

  constructor(private readonly now: () => Date = () => new Date()) {}

  async findBySession(sessionId: string): Promise<Conversation | null> {
    const conversation = this.conversations.get(sessionId);
    return conversation ? structuredClone(conversation) : null;
  }

  async create(input: CreateConversationInput): Promise<Conversation> {
    if (this.conversations.has(input.sessionId)) {
      throw new Error(`Conversation already exists: ${input.sessionId}`);
    }
    const timestamp = this.now();
    const conversation: Conversation = {
      sessionId: input.sessionId,
      origin: input.origin,
      agentId: input.agentId ?? null,
      status: input.status ?? 'active',
      escalatedTo: input.escalatedTo ?? null,
      previousSessionId: input.previousSessionId ?? null,
      messages: [],
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.conversations.set(conversation.sessionId, conversation);
    return structuredClone(conversation);
  }

  async appendMessage(
    sessionId: string,
    message: Omit<StoredMessage, 'id' | 'createdAt'>,
  ): Promise<StoredMessage> {
    const conversation = this.require(sessionId);
    const stored: StoredMessage = { ...message, id: randomUUID(), createdAt: this.now() };
    conversation.messages.push(stored);
    conversation.updatedAt = stored.createdAt;
    return structuredClone(stored);
  }

  async update(sessionId: string, update: ConversationUpdate): Promise<Conversation> {
    const conversation = this.require(sessionId);
    Object.assign(conversation, update, { updatedAt: this.now() });
    return structuredClone(conversation);
  }

  private require(sessionId: string): Conversation {
    const conversation = this.conversations.get(sessionId);
    if (!conversation) throw new Error(`Conversation not found: ${sessionId}`);
    return conversation;
  }
}
