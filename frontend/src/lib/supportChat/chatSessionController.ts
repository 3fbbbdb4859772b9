import { makeAutoObservable, observable } from 'mobx';
import { logger } from '../../helpers/logger';
import { ConnectionLostError } from './errors';
import { armHeartbeat, DEFAULT_HEARTBEAT_TIMEOUT_MS } from './heartbeatMonitor';
import { executeWithRetry, type RetryOptions } from './retryController';
import type { SessionStore } from './sessionStore';
import { silentSpeech } from './speech';
import { decodeStream } from './streamDecoder';
import type { ChatStreamPayload, StreamTransport } from './streamTransport';
import type { ChannelFactory, LiveChannel } from './escalationChannel';
import {
  initialControllerState,
  transition,
  type ControllerEvent,
  type Effect,
} from './transitions';
import type { ControllerState, SpeechOutput } from './types';

const log = logger.child('session-controller');

export type ChatSessionControllerOptions = {
  sessionStore: SessionStore;
  transport: StreamTransport;
  channelFactory: ChannelFactory;
  origin: string;
  speech?: SpeechOutput;
  retry?: Pick<RetryOptions, 'maxRetries' | 'perAttemptTimeoutMs' | 'backoffMs' | 'sleep'>;
  heartbeat?: { timeoutMs?: number; pollIntervalMs?: number };
  now?: () => number;
  createId?: () => string;
};

type StartRequest = Extract<Effect, { type: 'startRequest' }>;

let idCounter = 0;
const defaultCreateId = () => `msg_${Date.now().toString(36)}_${(++idCounter).toString(36)}`;

/**
 * Observable chat session. State changes only through `transition`; this class
 * runs the effects it returns (requests, live chat, storage, speech).
 */
export class ChatSessionController {
  state: ControllerState = initialControllerState();

  private readonly options: ChatSessionControllerOptions;
  private readonly requests = new Map<number, AbortController>();
  private readonly running = new Set<Promise<void>>();
  private channel: LiveChannel | null = null;
  private requestSeq = 0;

  constructor(options: ChatSessionControllerOptions) {
    this.options = options;

    makeAutoObservable<ChatSessionController, 'options' | 'requests' | 'running' | 'channel' | 'requestSeq'>(
      this,
      {
        state: observable.ref,
        options: false,
        requests: false,
        running: false,
        channel: false,
        requestSeq: false,
      },
      { autoBind: true },
    );
  }

  get messages() {
    return this.state.messages;
  }

  get isBusy() {
    return this.state.activeRequest !== null;
  }

  get isEscalated() {
    return this.state.mode === 'escalated';
  }

  /** Sends a question, or a live chat message while escalated. False when there is nothing to send. */
  submit(text: string): boolean {
    if (!text.trim()) return false;

    const sessionId = this.state.escalation?.sessionId ?? this.options.sessionStore.resolve();
    this.dispatch({
      type: 'submit',
      text,
      requestId: ++this.requestSeq,
      sessionId,
      messageId: this.createId(),
      at: this.now(),
    });
    return true;
  }

  selectAgent(agentId: number | null, welcome?: string) {
    this.dispatch({ type: 'selectAgent', agentId, welcome, messageId: this.createId(), at: this.now() });
  }

  resetToAuto() {
    this.dispatch({ type: 'resetToAuto', messageId: this.createId(), at: this.now() });
  }

  abort() {
    this.dispatch({ type: 'abort' });
  }

  close() {
    this.dispatch({ type: 'close' });
  }

  setTyping(isTyping: boolean) {
    if (this.state.mode === 'escalated') this.channel?.sendTyping(isTyping);
  }

  dispose() {
    for (const controller of this.requests.values()) controller.abort();
    this.channel?.close();
    this.channel = null;
  }

  /** Resolves once every request started so far has finished. */
  async whenSettled(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  private dispatch(event: ControllerEvent) {
    const { state, effects } = transition(this.state, event);
    this.state = state;
    for (const effect of effects) this.run(effect);
  }

  private run(effect: Effect) {
    switch (effect.type) {
      case 'startRequest': {
        const task: Promise<void> = this.runRequest(effect)
          .catch((error: unknown) => log.error('Request runner crashed', error))
          .finally(() => this.running.delete(task));
        this.running.add(task);
        return;
      }
      case 'cancelRequest':
        this.requests.get(effect.requestId)?.abort();
        return;
      case 'replaceSession':
        this.options.sessionStore.replace(effect.sessionId);
        return;
      case 'openChannel':
        this.channel?.close();
        this.channel = this.options.channelFactory(effect.sessionId, {
          onFrame: (frame) => this.dispatch({ type: 'channelFrame', frame, messageId: this.createId(), at: this.now() }),
          onClose: () => this.dispatch({ type: 'channelClosed' }),
        });
        return;
      case 'closeChannel':
        this.channel?.close();
        this.channel = null;
        return;
      case 'endEscalation': {
        const ended = this.channel?.end() ?? false;
        this.channel = null;
        // The server still treats the old session as escalated.
        if (!ended) this.options.sessionStore.renew();
        return;
      }
      case 'sendOverChannel':
        if (!this.channel?.send(effect.text)) {
          this.dispatch({ type: 'channelSendFailed', messageId: this.createId(), at: this.now() });
        }
        return;
      case 'speak':
        (this.options.speech ?? silentSpeech).speak(effect.text);
        return;
      case 'touchSession':
        this.options.sessionStore.touch();
        return;
      case 'log':
        log[effect.level](effect.message, ...(effect.data === undefined ? [] : [effect.data]));
        return;
    }
  }

  private async runRequest({ requestId, sessionId, text, agentId }: StartRequest) {
    const controller = new AbortController();
    this.requests.set(requestId, controller);

    const payload: ChatStreamPayload = {
      message: text,
      session_id: sessionId,
      origin: this.options.origin,
      ...(agentId !== null ? { agent_id: agentId } : {}),
    };

    try {
      const outcome = await executeWithRetry(
        ({ signal }) => this.streamAttempt(requestId, payload, signal),
        {
          ...this.options.retry,
          signal: controller.signal,
          onRetry: ({ attempt, totalAttempts }) => this.dispatch({ type: 'retrying', requestId, attempt, totalAttempts }),
        },
      );

      if (outcome.status === 'succeeded') {
        this.dispatch({ type: 'streamEnded', requestId });
      } else if (outcome.status === 'cancelled') {
        this.dispatch({ type: 'requestCancelled', requestId });
      } else {
        this.dispatch({
          type: 'requestFailed',
          requestId,
          message: outcome.message,
          messageId: this.createId(),
          at: this.now(),
        });
      }
    } finally {
      this.requests.delete(requestId);
    }
  }

  private async streamAttempt(requestId: number, payload: ChatStreamPayload, signal: AbortSignal) {
    const reader = await this.options.transport.open(payload, signal);

    const reading = new AbortController();
    const stopReading = () => reading.abort(signal.reason);
    if (signal.aborted) stopReading();
    else signal.addEventListener('abort', stopReading, { once: true });
    const heartbeat = armHeartbeat({
      ...this.options.heartbeat,
      onStall: (idleMs) => {
        log.warn('Stream went silent', { requestId, idleMs });
        reading.abort(new ConnectionLostError(idleMs));
      },
    });

    try {
      for await (const event of decodeStream(reader, { signal: reading.signal, onChunk: heartbeat.reset })) {
        this.dispatch({ type: 'stream', requestId, event, messageId: this.createId(), at: this.now() });
        // Terminal frame handled, or the turn was superseded.
        if (this.state.activeRequest?.id !== requestId) return;
      }
    } finally {
      heartbeat.disarm();
      signal.removeEventListener('abort', stopReading);
    }

    if (heartbeat.stalled) {
      throw new ConnectionLostError(this.options.heartbeat?.timeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS);
    }
    if (signal.aborted) throw signal.reason;
  }

  private now() {
    return (this.options.now ?? Date.now)();
  }

  private createId() {
    return (this.options.createId ?? defaultCreateId)();
  }
}
