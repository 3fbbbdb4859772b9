import { formatBotMessage } from './formatMessage';
import type {
  ChannelFrame,
  ChatMessage,
  ControllerState,
  StreamEvent,
  TurnOutcome,
} from './types';

export type ControllerEvent =
  | { type: 'submit'; text: string; requestId: number; sessionId: string; messageId: string; at: number }
  | { type: 'stream'; requestId: number; event: StreamEvent; messageId: string; at: number }
  | { type: 'retrying'; requestId: number; attempt: number; totalAttempts: number }
  | { type: 'requestFailed'; requestId: number; message: string; messageId: string; at: number }
  | { type: 'requestCancelled'; requestId: number }
  | { type: 'streamEnded'; requestId: number }
  | { type: 'selectAgent'; agentId: number | null; welcome?: string; messageId: string; at: number }
  | { type: 'resetToAuto'; messageId: string; at: number }
  | { type: 'abort' }
  | { type: 'close' }
  | { type: 'channelFrame'; frame: ChannelFrame; messageId: string; at: number }
  | { type: 'channelClosed' }
  | { type: 'channelSendFailed'; messageId: string; at: number };

export type Effect =
  | { type: 'startRequest'; requestId: number; sessionId: string; text: string; agentId: number | null }
  | { type: 'cancelRequest'; requestId: number }
  | { type: 'replaceSession'; sessionId: string }
  | { type: 'openChannel'; sessionId: string }
  | { type: 'closeChannel' }
  /** Asks the live chat to hand the session back to the bot, then closes it. */
  | { type: 'endEscalation' }
  | { type: 'sendOverChannel'; text: string }
  | { type: 'speak'; text: string }
  | { type: 'touchSession' }
  | { type: 'log'; level: 'debug' | 'info' | 'warn'; message: string; data?: unknown };

export type Transition = {
  state: ControllerState;
  effects: Effect[];
};

export const TEXT = {
  retrying: (attempt: number, total: number) => `Connection problem. Retrying (attempt ${attempt} of ${total})...`,
  backToAssistant: 'You are back with the virtual assistant.',
  staffJoined: (name: string) => `${name} joined the chat.`,
  chattingWith: (name: string) => `You are chatting with ${name}.`,
  liveChatLost: 'Live chat connection lost. Messages may not be delivered.',
  notDelivered: 'Your message could not be delivered because the live chat is disconnected.',
  defaultStaffName: 'A staff member',
} as const;

export const initialControllerState = (): ControllerState => ({
  mode: 'auto',
  selectedAgentId: null,
  activeRequest: null,
  escalation: null,
  phase: 'idle',
  lastOutcome: null,
  loading: false,
  statusText: null,
  notice: null,
  agentTyping: null,
  messages: [],
});

const unchanged = (state: ControllerState, effects: Effect[] = []): Transition => ({ state, effects });

const ignored = (state: ControllerState, message: string, data?: unknown): Transition =>
  unchanged(state, [{ type: 'log', level: 'debug', message, data }]);

const restingPhase = (state: ControllerState) => (state.mode === 'escalated' ? 'escalated' : 'idle');

const systemMessage = (
  id: string,
  at: number,
  content: string,
  variant: NonNullable<ChatMessage['variant']>,
): ChatMessage => ({ id, role: 'system', content, timestamp: at, streaming: false, variant });

const finalBotMessage = (id: string, at: number, content: string, variant?: ChatMessage['variant']): ChatMessage => ({
  id,
  role: 'bot',
  content,
  timestamp: at,
  streaming: false,
  formatted: formatBotMessage(content),
  ...(variant ? { variant } : {}),
});

/** Closes the turn's bot message, formatting it once. Returns the final text. */
const finalizeBotMessage = (state: ControllerState): { messages: ChatMessage[]; text: string } => {
  const botId = state.activeRequest?.botMessageId;
  if (!botId) return { messages: state.messages, text: '' };

  let text = '';
  const messages = state.messages.map((message) => {
    if (message.id !== botId) return message;
    text = message.content;
    return { ...message, streaming: false, formatted: formatBotMessage(message.content) };
  });
  return { messages, text };
};

const endTurn = (state: ControllerState, outcome: TurnOutcome, messages: ChatMessage[]): ControllerState => ({
  ...state,
  messages,
  activeRequest: null,
  loading: false,
  statusText: null,
  notice: null,
  lastOutcome: outcome,
  phase: restingPhase(state),
});

/** Appends to the turn's bot message, creating it on first use. */
const appendToTurn = (
  state: ControllerState,
  messageId: string,
  at: number,
  patch: { content?: string; sources?: ChatMessage['sources'] },
): ControllerState => {
  const request = state.activeRequest;
  if (!request) return state;

  const opened = { ...state, loading: false, phase: 'streaming' as const };

  if (!request.botMessageId) {
    const created: ChatMessage = {
      id: messageId,
      role: 'bot',
      content: patch.content ?? '',
      timestamp: at,
      streaming: true,
      ...(patch.sources ? { sources: patch.sources } : {}),
    };
    return {
      ...opened,
      activeRequest: { ...request, botMessageId: messageId },
      messages: [...state.messages, created],
    };
  }

  return {
    ...opened,
    messages: state.messages.map((message) => {
      if (message.id !== request.botMessageId) return message;
      return {
        ...message,
        content: message.content + (patch.content ?? ''),
        ...(patch.sources ? { sources: patch.sources } : {}),
      };
    }),
  };
};

const onStreamEvent = (
  state: ControllerState,
  event: StreamEvent,
  messageId: string,
  at: number,
): Transition => {
  const request = state.activeRequest;
  if (!request) return unchanged(state);

  if (event.session_id && event.session_id !== request.sessionId) {
    return unchanged(state, [{
      type: 'log',
      level: 'warn',
      message: 'Discarded frame for another session',
      data: { expected: request.sessionId, received: event.session_id },
    }]);
  }

  switch (event.type) {
    case 'status':
      return unchanged({ ...state, statusText: event.content || null });

    case 'context':
      return unchanged(appendToTurn(state, messageId, at, { sources: event.sources }));

    case 'token':
    case 'confirmation':
      return unchanged(appendToTurn({ ...state, statusText: null }, messageId, at, { content: event.content }));

    case 'classification': {
      const effects: Effect[] = [{
        type: 'log',
        level: 'info',
        message: 'Question classified',
        data: { agentId: event.agent_id, agentName: event.agent_name, stateless: event.stateless },
      }];
      if (event.stateless || state.mode !== 'auto') return unchanged(state, effects);
      return unchanged({ ...state, mode: 'agent-selected', selectedAgentId: event.agent_id }, effects);
    }

    case 'done': {
      const { messages, text } = finalizeBotMessage(state);
      const effects: Effect[] = [{ type: 'touchSession' }];
      if (text.trim()) effects.unshift({ type: 'speak', text });
      return { state: endTurn(state, 'completed', messages), effects };
    }

    case 'error': {
      const { messages } = finalizeBotMessage(state);
      const shown = event.code === 'agent_required'
        ? finalBotMessage(messageId, at, event.content, 'info')
        : systemMessage(messageId, at, event.content, 'error');
      return {
        state: endTurn(state, 'failed', [...messages, shown]),
        effects: [{ type: 'log', level: 'warn', message: 'Server reported an error', data: { code: event.code } }],
      };
    }

    case 'escalation': {
      // The handoff ends the turn; nothing else on this stream is shown.
      const { messages } = finalizeBotMessage(state);
      const next: ControllerState = {
        ...state,
        mode: 'escalated',
        selectedAgentId: null,
        escalation: { sessionId: event.new_session_id, agentName: event.metadata.agent_name },
        activeRequest: null,
        phase: 'escalated',
        lastOutcome: 'completed',
        loading: false,
        statusText: null,
        notice: null,
        messages: [...messages, finalBotMessage(messageId, at, event.content, 'info')],
      };
      return {
        state: next,
        effects: [
          { type: 'cancelRequest', requestId: request.id },
          { type: 'replaceSession', sessionId: event.new_session_id },
          { type: 'openChannel', sessionId: event.new_session_id },
          { type: 'log', level: 'info', message: 'Escalated to live chat', data: { sessionId: event.new_session_id } },
        ],
      };
    }
  }
};

const onChannelFrame = (state: ControllerState, frame: ChannelFrame, messageId: string, at: number): Transition => {
  if (state.mode !== 'escalated') return ignored(state, 'Live chat frame outside escalation', frame.type);
  const staffName = (name?: string | null) => name || state.escalation?.agentName || TEXT.defaultStaffName;

  switch (frame.type) {
    case 'message': {
      // The room echoes our own messages back.
      if (frame.role === 'user') return unchanged(state);
      const message: ChatMessage = {
        id: messageId,
        role: 'human_agent',
        content: frame.content,
        timestamp: at,
        streaming: false,
        authorName: staffName(frame.user_name),
        formatted: formatBotMessage(frame.content),
      };
      return unchanged({ ...state, agentTyping: null, messages: [...state.messages, message] });
    }

    case 'typing':
      if (frame.role === 'user') return unchanged(state);
      return unchanged({ ...state, agentTyping: frame.is_typing ? staffName(frame.user_name) : null });

    case 'user_joined':
      if (frame.role === 'user') return unchanged(state);
      return unchanged({
        ...state,
        messages: [...state.messages, systemMessage(messageId, at, TEXT.staffJoined(staffName(frame.user_name)), 'notice')],
      });

    case 'escalamiento_info': {
      const agentName = staffName(frame.user_name);
      return unchanged({
        ...state,
        escalation: state.escalation ? { ...state.escalation, agentName } : null,
        messages: [...state.messages, systemMessage(messageId, at, TEXT.chattingWith(agentName), 'notice')],
      });
    }

    case 'finalizacion_escalamiento':
      return {
        state: {
          ...state,
          mode: 'auto',
          selectedAgentId: null,
          escalation: null,
          agentTyping: null,
          notice: null,
          phase: state.activeRequest ? state.phase : 'idle',
          messages: [...state.messages, systemMessage(messageId, at, frame.content || TEXT.backToAssistant, 'notice')],
        },
        effects: [{ type: 'closeChannel' }],
      };

    case 'error':
      return unchanged({ ...state, messages: [...state.messages, systemMessage(messageId, at, frame.content, 'error')] });
  }
};

/**
 * The controller's state machine. Pure: all I/O is described by the returned
 * effects, which the controller runs in order.
 */
export const transition = (state: ControllerState, event: ControllerEvent): Transition => {
  switch (event.type) {
    case 'submit': {
      const text = event.text.trim();
      if (!text) return ignored(state, 'Ignored empty message');

      const userMessage: ChatMessage = {
        id: event.messageId,
        role: 'user',
        content: text,
        timestamp: event.at,
        streaming: false,
      };

      if (state.mode === 'escalated') {
        return {
          state: { ...state, messages: [...state.messages, userMessage] },
          effects: [{ type: 'sendOverChannel', text }, { type: 'touchSession' }],
        };
      }

      const effects: Effect[] = [];
      let { messages } = state;
      if (state.activeRequest) {
        effects.push({ type: 'cancelRequest', requestId: state.activeRequest.id });
        messages = finalizeBotMessage(state).messages;
      }

      effects.push({
        type: 'startRequest',
        requestId: event.requestId,
        sessionId: event.sessionId,
        text,
        agentId: state.mode === 'agent-selected' ? state.selectedAgentId : null,
      });

      return {
        state: {
          ...state,
          messages: [...messages, userMessage],
          activeRequest: { id: event.requestId, sessionId: event.sessionId, botMessageId: null },
          phase: 'sending',
          loading: true,
          lastOutcome: null,
          statusText: null,
          notice: null,
        },
        effects,
      };
    }

    case 'stream':
      if (state.activeRequest?.id !== event.requestId) return ignored(state, 'Frame for a finished request');
      return onStreamEvent(state, event.event, event.messageId, event.at);

    case 'retrying': {
      const request = state.activeRequest;
      if (request?.id !== event.requestId) return unchanged(state);
      return unchanged({
        ...state,
        messages: state.messages.filter((message) => message.id !== request.botMessageId),
        activeRequest: { ...request, botMessageId: null },
        phase: 'sending',
        loading: true,
        statusText: null,
        notice: TEXT.retrying(event.attempt, event.totalAttempts),
      });
    }

    case 'requestFailed': {
      if (state.activeRequest?.id !== event.requestId) return unchanged(state);
      const { messages } = finalizeBotMessage(state);
      return unchanged(endTurn(state, 'failed', [...messages, systemMessage(event.messageId, event.at, event.message, 'error')]));
    }

    case 'requestCancelled': {
      if (state.activeRequest?.id !== event.requestId) return unchanged(state);
      return unchanged(endTurn(state, 'cancelled', finalizeBotMessage(state).messages));
    }

    case 'streamEnded': {
      if (state.activeRequest?.id !== event.requestId) return unchanged(state);
      // The source closed without `done`; whatever arrived is the answer.
      const { messages, text } = finalizeBotMessage(state);
      const effects: Effect[] = [
        { type: 'log', level: 'warn', message: 'Stream ended without a terminal event' },
        { type: 'touchSession' },
      ];
      if (text.trim()) effects.push({ type: 'speak', text });
      return { state: endTurn(state, 'completed', messages), effects };
    }

    case 'selectAgent': {
      if (state.mode === 'escalated') return ignored(state, 'Agent selection ignored during live chat');
      const next: ControllerState = event.agentId === null
        ? { ...state, mode: 'auto', selectedAgentId: null }
        : { ...state, mode: 'agent-selected', selectedAgentId: event.agentId };
      if (event.agentId === null || !event.welcome) return unchanged(next);
      return unchanged({ ...next, messages: [...next.messages, finalBotMessage(event.messageId, event.at, event.welcome)] });
    }

    case 'resetToAuto': {
      const effects: Effect[] = [];
      const wasEscalated = state.mode === 'escalated';
      let { messages } = state;
      let { lastOutcome } = state;

      if (wasEscalated) effects.push({ type: 'endEscalation' });
      if (state.activeRequest) {
        effects.push({ type: 'cancelRequest', requestId: state.activeRequest.id });
        messages = finalizeBotMessage(state).messages;
        lastOutcome = 'cancelled';
      }
      if (wasEscalated) messages = [...messages, systemMessage(event.messageId, event.at, TEXT.backToAssistant, 'notice')];

      return {
        state: {
          ...state,
          mode: 'auto',
          selectedAgentId: null,
          escalation: null,
          activeRequest: null,
          phase: 'idle',
          loading: false,
          statusText: null,
          notice: null,
          agentTyping: null,
          lastOutcome,
          messages,
        },
        effects,
      };
    }

    case 'abort': {
      if (!state.activeRequest) return unchanged(state);
      return {
        state: endTurn(state, 'cancelled', finalizeBotMessage(state).messages),
        effects: [{ type: 'cancelRequest', requestId: state.activeRequest.id }],
      };
    }

    case 'close':
      return unchanged(state, [{ type: 'touchSession' }]);

    case 'channelFrame':
      return onChannelFrame(state, event.frame, event.messageId, event.at);

    case 'channelClosed':
      if (state.mode !== 'escalated') return unchanged(state);
      return unchanged({ ...state, agentTyping: null, notice: TEXT.liveChatLost });

    case 'channelSendFailed':
      return unchanged({
        ...state,
        messages: [...state.messages, systemMessage(event.messageId, event.at, TEXT.notDelivered, 'error')],
      });
  }
};
