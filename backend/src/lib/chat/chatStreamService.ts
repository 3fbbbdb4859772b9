import { randomBytes } from 'node:crypto';
import { logger } from '../../utils/logger';
import type { Agent, AgentDirectory } from '../agents/agentDirectory';
import type { Conversation, ConversationRepository } from '../conversations/conversationRepository';
import type { EscalationDetector, PendingConfirmations } from '../escalation/escalationDetector';
import type { StaffRoster } from '../escalation/staffRoster';
import type { LlmService } from '../llm/llmService';
import type { ContextRetriever, RetrievedDocument } from '../rag/contextRetriever';
import type { AgentClassifier } from './agentClassifier';
import { buildChatMessages } from './promptBuilder';
import type { ServerStreamEvent } from './streamEvents';

const log = logger.child('ChatStream');

export const REPLIES = {
  classifying: 'Classifying your question...',
  preparing: 'Preparing your answer...',
  agentRequired: 'I could not tell which office handles this question. Please choose an assistant from the list to continue.',
  sessionEscalated: 'This conversation is now with a staff member. Please keep writing in the live chat.',
  sessionClosed: 'This conversation has been closed. Reload the page to start a new one.',
  noStaff: 'No staff member is available right now. Please try again later or keep chatting with the assistant.',
  llmUnavailable: 'The assistant is unavailable right now. Please try again in a moment.',
  internalError: 'Something went wrong while answering. Please try again.',
  escalationRejected: 'Understood, we will keep working on it together here. What else can I help you with?',
  escalationConfirmed: 'You are being connected with a staff member. Please wait a moment.\n\n'
    + 'To return to the virtual assistant at any time, write "back to the bot" or "end escalation".',
  confirmEscalation: (teamName: string) => `Would you like to talk to a person from the ${teamName} team?\n\n`
    + 'This conversation will be recorded and a staff member will answer you shortly.\n\n'
    + 'Reply "yes" to connect or "no" to keep chatting here.',
  assignedTo: (staffName: string) => `Conversation assigned to ${staffName}`,
} as const;

export type ChatStreamRequest = {
  message: string;
  sessionId: string;
  origin: string;
  agentId?: number;
  signal?: AbortSignal;
};

export type ChatStreamSettings = {
  temperature: number;
  maxTokens: number;
  historyLimit: number;
  retrievalLimit: number;
};

export type ChatStreamDependencies = {
  directory: AgentDirectory;
  classifier: AgentClassifier;
  detector: EscalationDetector;
  pending: PendingConfirmations;
  roster: StaffRoster;
  repository: ConversationRepository;
  retriever: ContextRetriever;
  llm: LlmService;
  settings: ChatStreamSettings;
  createSessionId?: (origin: string) => string;
};

const defaultSessionId = (origin: string) => `${origin}_${Date.now()}_${randomBytes(4).toString('hex')}_escalated`;

/**
 * Produces the events of one streamed chat turn. Every event is stamped with the
 * request's session id and the sequence ends with exactly one `done` or `error`.
 */
export class ChatStreamService {
  private readonly createSessionId: (origin: string) => string;

  constructor(private readonly deps: ChatStreamDependencies) {
    this.createSessionId = deps.createSessionId ?? defaultSessionId;
  }

  async *stream(request: ChatStreamRequest): AsyncGenerator<ServerStreamEvent> {
    for await (const event of this.run(request)) {
      yield { ...event, session_id: request.sessionId };
    }
  }

  private async *run(request: ChatStreamRequest): AsyncGenerator<ServerStreamEvent> {
    const { repository, detector, pending } = this.deps;

    let conversation: Conversation;
    try {
      conversation = await this.ensureConversation(request);
    } catch (error) {
      log.error('Failed to load conversation', { sessionId: request.sessionId, error });
      yield { type: 'error', content: REPLIES.internalError, code: 'internal_error' };
      return;
    }

    if (conversation.status === 'escalated') {
      yield { type: 'error', content: REPLIES.sessionEscalated, code: 'session_escalated' };
      return;
    }
    if (conversation.status === 'closed') {
      yield { type: 'error', content: REPLIES.sessionClosed, code: 'session_closed' };
      return;
    }

    if (pending.isPending(request.sessionId)) {
      const answer = detector.readConfirmation(request.message);
      pending.clear(request.sessionId);

      if (answer === 'confirm') {
        await repository.appendMessage(request.sessionId, { role: 'user', content: request.message });
        yield* this.escalate(conversation);
        return;
      }
      if (answer === 'reject') {
        await repository.appendMessage(request.sessionId, { role: 'user', content: request.message });
        await repository.appendMessage(request.sessionId, { role: 'bot', content: REPLIES.escalationRejected });
        yield { type: 'token', content: REPLIES.escalationRejected };
        yield { type: 'done', agent_id: conversation.agentId };
        return;
      }
      log.debug('Confirmation left unanswered; handling as a normal question', { sessionId: request.sessionId });
    }

    if (detector.wantsHuman(request.message)) {
      const currentAgent = conversation.agentId !== null ? this.deps.directory.getById(conversation.agentId) : null;
      const content = REPLIES.confirmEscalation(currentAgent?.name ?? 'student support');
      pending.mark(request.sessionId);
      await repository.appendMessage(request.sessionId, { role: 'user', content: request.message });
      await repository.appendMessage(request.sessionId, { role: 'bot', content });
      yield { type: 'confirmation', content };
      yield { type: 'done', agent_id: conversation.agentId };
      return;
    }

    yield* this.answer(request, conversation);
  }

  private async *answer(request: ChatStreamRequest, conversation: Conversation): AsyncGenerator<ServerStreamEvent> {
    const { directory, classifier, repository, settings } = this.deps;

    let agent: Agent;
    if (request.agentId !== undefined) {
      yield { type: 'status', content: REPLIES.preparing };
      const selected = directory.getById(request.agentId);
      if (!selected) {
        yield { type: 'error', content: `Assistant ${request.agentId} is not available.`, code: 'agent_not_found' };
        return;
      }
      agent = selected;
    } else {
      yield { type: 'status', content: REPLIES.classifying };
      const classification = classifier.classify(request.message);
      if (!classification) {
        yield { type: 'error', content: REPLIES.agentRequired, code: 'agent_required' };
        return;
      }
      agent = classification.agent;
      log.debug('Question classified', {
        agentId: agent.id,
        matchedKeywords: classification.matchedKeywords,
      });
      yield { type: 'classification', agent_id: agent.id, agent_name: agent.name, stateless: true };
    }

    if (conversation.agentId !== agent.id) {
      await repository.update(request.sessionId, { agentId: agent.id });
    }

    const history = conversation.messages;
    await repository.appendMessage(request.sessionId, { role: 'user', content: request.message, agentId: agent.id });

    const documents = await this.retrieve(request.message, agent.id);
    if (documents.length > 0) {
      yield {
        type: 'context',
        sources: documents.map(({ id, title, url }) => (url ? { id, title, url } : { id, title })),
      };
    }

    const messages = buildChatMessages({
      agent,
      question: request.message,
      documents,
      history,
      historyLimit: settings.historyLimit,
    });

    let reply = '';
    try {
      for await (const text of this.deps.llm.stream(messages, {
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
        signal: request.signal,
      })) {
        reply += text;
        yield { type: 'token', content: text };
      }
    } catch (error) {
      if (request.signal?.aborted) {
        log.info('Client went away during generation', { sessionId: request.sessionId });
        return;
      }
      log.error('Generation failed', { sessionId: request.sessionId, error });
      yield { type: 'error', content: REPLIES.llmUnavailable, code: 'llm_unavailable' };
      return;
    }

    if (request.signal?.aborted) return;

    await repository.appendMessage(request.sessionId, { role: 'bot', content: reply, agentId: agent.id });
    yield { type: 'done', agent_id: agent.id };
  }

  private async *escalate(conversation: Conversation): AsyncGenerator<ServerStreamEvent> {
    const { directory, roster, repository } = this.deps;
    const agent = conversation.agentId !== null ? directory.getById(conversation.agentId) : null;
    const staff = roster.pickFor(agent?.department ?? 'general');

    if (!staff) {
      log.warn('No staff available for escalation', {
        sessionId: conversation.sessionId,
        department: agent?.department ?? 'general',
      });
      await repository.appendMessage(conversation.sessionId, { role: 'system', content: REPLIES.noStaff });
      yield { type: 'error', content: REPLIES.noStaff, code: 'no_staff_available' };
      return;
    }

    const newSessionId = this.createSessionId(conversation.origin);
    await repository.update(conversation.sessionId, { status: 'closed' });
    await repository.create({
      sessionId: newSessionId,
      origin: conversation.origin,
      agentId: conversation.agentId,
      status: 'escalated',
      escalatedTo: { userId: staff.id, userName: staff.name },
      previousSessionId: conversation.sessionId,
    });
    await repository.appendMessage(newSessionId, { role: 'system', content: REPLIES.assignedTo(staff.name) });

    log.info('Conversation escalated', {
      from: conversation.sessionId,
      to: newSessionId,
      staffId: staff.id,
    });

    yield {
      type: 'escalation',
      content: REPLIES.escalationConfirmed,
      new_session_id: newSessionId,
      metadata: { agent_name: staff.name },
    };
    yield { type: 'done', agent_id: conversation.agentId };
  }

  private async ensureConversation(request: ChatStreamRequest): Promise<Conversation> {
    const existing = await this.deps.repository.findBySession(request.sessionId);
    if (existing) return existing;
    return this.deps.repository.create({ sessionId: request.sessionId, origin: request.origin });
  }

  private async retrieve(question: string, agentId: number): Promise<RetrievedDocument[]> {
    try {
      return await this.deps.retriever.retrieve({ question, agentId, limit: this.deps.settings.retrievalLimit });
    } catch (error) {
      log.warn('Context retrieval failed; answering without context', { agentId, error });
      return [];
    }
  }
}
