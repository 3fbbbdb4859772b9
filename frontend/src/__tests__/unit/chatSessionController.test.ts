import { ChatSessionController } from '../../lib/supportChat/chatSessionController';
import { ChatRequestError, FAILURE_MESSAGES } from '../../lib/supportChat/errors';
import { SessionStore } from '../../lib/supportChat/sessionStore';
import {
  FakeLiveChat,
  FakeReader,
  FakeTransport,
  MemoryStorage,
  pendingUntilAborted,
  sse,
} from '../../testUtils/fakes';

type TransportAttempts = ConstructorParameters<typeof FakeTransport>[0];

const setup = (
  attempts: TransportAttempts,
  options: { perAttemptTimeoutMs?: number; maxRetries?: number; heartbeat?: { timeoutMs?: number; pollIntervalMs?: number } } = {},
) => {
  let seq = 0;
  const sessionStore = new SessionStore({
    storage: new MemoryStorage(),
    origin: 'web',
    pagePath: () => '/help',
    now: () => 1_000,
  });
  const transport = new FakeTransport(attempts);
  const live = new FakeLiveChat();
  const spoken: string[] = [];
  const controller = new ChatSessionController({
    sessionStore,
    transport,
    channelFactory: live.factory,
    origin: 'web',
    speech: { speak: (text) => spoken.push(text) },
    retry: {
      sleep: async () => undefined,
      perAttemptTimeoutMs: options.perAttemptTimeoutMs ?? 5_000,
      maxRetries: options.maxRetries,
    },
    heartbeat: options.heartbeat,
    now: () => 1_000,
    createId: () => `id${++seq}`,
  });
  return { controller, transport, live, spoken, sessionStore };
};

const waitFor = async (predicate: () => boolean) => {
  for (let i = 0; i < 200; i++) {
    if (predicate()) return;
    await new Promise((resolve) => setTimeout(resolve, 1));
  }
  throw new Error('Condition was not met in time');
};

const roles = (controller: ChatSessionController) => controller.messages.map(({ role, content }) => [role, content]);

describe('ChatSessionController', () => {
  test('streams an answer into the conversation', async () => {
    const reader = new FakeReader([
      'data: {"type":"token","content":"Hi"}\n\n',
      'data: {"type":"token","content":" there"}\n\n',
      'data: {"type":"done"}\n\n',
    ]);
    const { controller, transport, spoken, sessionStore } = setup([reader]);

    expect(controller.submit('Hello')).toBe(true);
    expect(controller.isBusy).toBe(true);
    await controller.whenSettled();

    expect(roles(controller)).toEqual([['user', 'Hello'], ['bot', 'Hi there']]);
    expect(controller.state).toMatchObject({ phase: 'idle', lastOutcome: 'completed', loading: false });
    expect(controller.isBusy).toBe(false);
    expect(spoken).toEqual(['Hi there']);
    expect(transport.payloads).toEqual([{ message: 'Hello', session_id: sessionStore.resolve(), origin: 'web' }]);
  });

  test('does not send blank messages', () => {
    const { controller, transport } = setup([new FakeReader([])]);

    expect(controller.submit('  ')).toBe(false);
    expect(transport.payloads).toEqual([]);
  });

  test('sends the selected agent with the question', async () => {
    const { controller, transport } = setup([new FakeReader([sse({ type: 'done', agent_id: 3 })])]);

    controller.selectAgent(3, 'Hi! I am the Finance Assistant.');
    controller.submit('How much is the fee?');
    await controller.whenSettled();

    expect(transport.payloads[0]?.agent_id).toBe(3);
  });

  test('retries after a network failure', async () => {
    const { controller, transport } = setup([
      new TypeError('Failed to fetch'),
      new FakeReader([sse({ type: 'token', content: 'Back online' }, { type: 'done' })]),
    ]);

    controller.submit('Hello');
    await controller.whenSettled();

    expect(transport.payloads).toHaveLength(2);
    expect(roles(controller)).toEqual([['user', 'Hello'], ['bot', 'Back online']]);
    expect(controller.state.notice).toBeNull();
  });

  test('gives up with the timeout message when every attempt times out', async () => {
    const { controller, transport } = setup([pendingUntilAborted], { perAttemptTimeoutMs: 10 });

    controller.submit('A very long question');
    await controller.whenSettled();

    expect(transport.payloads).toHaveLength(3);
    expect(roles(controller)).toEqual([['user', 'A very long question'], ['system', FAILURE_MESSAGES.timeout]]);
    expect(controller.state.lastOutcome).toBe('failed');
  });

  test('does not retry a rejected request', async () => {
    const { controller, transport } = setup([new ChatRequestError('Invalid request body', 400)]);

    controller.submit('Hello');
    await controller.whenSettled();

    expect(transport.payloads).toHaveLength(1);
    expect(controller.messages.at(-1)).toMatchObject({ role: 'system', content: FAILURE_MESSAGES.generic });
  });

  test('treats a silent stream as a lost connection', async () => {
    const reader = new FakeReader([sse({ type: 'token', content: 'Hi' })], { hang: true });
    const { controller } = setup([reader], { maxRetries: 0, heartbeat: { timeoutMs: 20, pollIntervalMs: 5 } });

    controller.submit('Hello');
    await controller.whenSettled();

    expect(reader.cancelled).toBe(true);
    expect(roles(controller)).toEqual([['user', 'Hello'], ['bot', 'Hi'], ['system', FAILURE_MESSAGES.timeout]]);
  });

  test('abort stops the stream and keeps the partial answer', async () => {
    const reader = new FakeReader([sse({ type: 'token', content: 'Partial' })], { hang: true });
    const { controller } = setup([reader]);

    controller.submit('Hello');
    await waitFor(() => controller.messages.length === 2);
    controller.abort();
    await controller.whenSettled();

    expect(reader.cancelled).toBe(true);
    expect(controller.messages[1]).toMatchObject({ role: 'bot', content: 'Partial', streaming: false });
    expect(controller.state.lastOutcome).toBe('cancelled');
  });

  test('a second question supersedes the first', async () => {
    const { controller, transport } = setup([
      new FakeReader([], { hang: true }),
      new FakeReader([sse({ type: 'token', content: 'Second answer' }, { type: 'done' })]),
    ]);

    controller.submit('First');
    controller.submit('Second');
    await controller.whenSettled();

    expect(transport.payloads.map(({ message }) => message)).toEqual(['First', 'Second']);
    expect(roles(controller)).toEqual([['user', 'First'], ['user', 'Second'], ['bot', 'Second answer']]);
    expect(controller.state.lastOutcome).toBe('completed');
  });

  test('hands over to the live chat on escalation and back', async () => {
    const { controller, transport, live, sessionStore } = setup([
      new FakeReader([
        sse(
          {
            type: 'escalation',
            content: 'You are being connected with a staff member.',
            new_session_id: 'web_escalated_1',
            metadata: { agent_name: 'Laura Medina' },
          },
          { type: 'done', agent_id: 1 },
        ),
      ]),
    ]);

    controller.submit('yes');
    await controller.whenSettled();

    expect(controller.isEscalated).toBe(true);
    expect(live.opened).toEqual(['web_escalated_1']);
    expect(sessionStore.resolve()).toBe('web_escalated_1');

    controller.setTyping(true);
    controller.submit('Can you check my application?');
    live.emit({ type: 'message', role: 'human_agent', content: 'Of course.', user_name: 'Laura Medina' });

    expect(live.typing).toEqual([true]);
    expect(live.sent).toEqual(['Can you check my application?']);
    expect(transport.payloads).toHaveLength(1);
    expect(controller.messages.at(-1)).toMatchObject({ role: 'human_agent', authorName: 'Laura Medina', content: 'Of course.' });

    live.emit({ type: 'finalizacion_escalamiento', content: 'You are back with the virtual assistant.' });

    expect(controller.isEscalated).toBe(false);
    expect(live.closed).toBe(1);
  });

  test('shows nothing the old stream sends after an escalation', async () => {
    const reader = new FakeReader([
      sse(
        { type: 'escalation', content: 'Connecting', new_session_id: 'esc1' },
        { type: 'token', content: 'LEAKED' },
        { type: 'done' },
      ),
    ], { hang: true });
    const { controller } = setup([reader]);

    controller.submit('yes');
    await controller.whenSettled();

    expect(roles(controller)).toEqual([['user', 'yes'], ['bot', 'Connecting']]);
    expect(controller.state).toMatchObject({ mode: 'escalated', activeRequest: null, lastOutcome: 'completed' });
    expect(reader.cancelled).toBe(true);
  });

  test('does not resend the question when the old stream fails after an escalation', async () => {
    const { controller, transport } = setup([
      new FakeReader(
        [sse({ type: 'escalation', content: 'Connecting', new_session_id: 'esc1' })],
        { failWith: new TypeError('network error') },
      ),
      new FakeReader([sse({ type: 'token', content: 'BOT AFTER ESCALATION' }, { type: 'done' })]),
    ]);

    controller.submit('yes');
    await controller.whenSettled();

    expect(transport.payloads).toHaveLength(1);
    expect(roles(controller)).toEqual([['user', 'yes'], ['bot', 'Connecting']]);
    expect(controller.isEscalated).toBe(true);
  });

  test('back to assistant ends the escalation on the server and keeps the session', async () => {
    const { controller, live, sessionStore } = setup([
      new FakeReader([sse({ type: 'escalation', content: 'Connecting', new_session_id: 'esc1' })]),
    ]);
    controller.submit('yes');
    await controller.whenSettled();

    controller.resetToAuto();

    expect(live.ended).toBe(1);
    expect(controller.isEscalated).toBe(false);
    expect(sessionStore.resolve()).toBe('esc1');
  });

  test('back to assistant starts a new session when the live chat is unreachable', async () => {
    const { controller, live, sessionStore } = setup([
      new FakeReader([sse({ type: 'escalation', content: 'Connecting', new_session_id: 'esc1' })]),
      new FakeReader([sse({ type: 'token', content: 'Hello again' }, { type: 'done' })]),
    ]);
    controller.submit('yes');
    await controller.whenSettled();
    live.connected = false;

    controller.resetToAuto();
    const renewed = sessionStore.resolve();
    controller.submit('What are the fees?');
    await controller.whenSettled();

    expect(renewed).not.toBe('esc1');
    expect(renewed.startsWith('web_1000_')).toBe(true);
    expect(controller.messages.at(-1)).toMatchObject({ role: 'bot', content: 'Hello again' });
  });

  test('reports a live message that could not be delivered', async () => {
    const { controller, live } = setup([
      new FakeReader([sse({ type: 'escalation', content: 'Connecting...', new_session_id: 'web_escalated_1' }, { type: 'done' })]),
    ]);
    controller.submit('yes');
    await controller.whenSettled();

    live.connected = false;
    controller.submit('Hello?');

    expect(controller.messages.at(-1)).toMatchObject({ role: 'system', variant: 'error' });
  });
});
