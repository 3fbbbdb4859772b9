import { EscalationChannel, escalationChannelFactory, liveChatUrl } from '../../lib/supportChat/escalationChannel';
import type { ChannelFrame } from '../../lib/supportChat/types';
import { FakeChannelSocket } from '../../testUtils/fakes';

const setup = () => {
  const socket = new FakeChannelSocket();
  const frames: ChannelFrame[] = [];
  const onClose = jest.fn();
  const urls: string[] = [];
  const channel = new EscalationChannel('ws://localhost:8080/ws/chat/web_1', { onFrame: (f) => frames.push(f), onClose }, {
    userName: 'Student',
    createSocket: (url) => {
      urls.push(url);
      return socket;
    },
  });
  return { socket, frames, onClose, urls, channel };
};

describe('liveChatUrl', () => {
  test('switches the scheme and encodes the session id', () => {
    expect(liveChatUrl('https://support.example.edu/', 'web 1')).toBe('wss://support.example.edu/ws/chat/web%201');
    expect(liveChatUrl('http://localhost:8080', 'web_1')).toBe('ws://localhost:8080/ws/chat/web_1');
  });
});

describe('EscalationChannel', () => {
  test('joins on open and flushes messages written while connecting', () => {
    const { socket, channel } = setup();

    expect(channel.send('Hello?')).toBe(true);
    expect(socket.sent).toEqual([]);

    socket.open();

    expect(socket.frames()).toEqual([
      { type: 'join', user_name: 'Student', role: 'user' },
      { type: 'message', content: 'Hello?' },
    ]);
  });

  test('sends messages and typing state once open', () => {
    const { socket, channel } = setup();
    socket.open();

    channel.send('I need help with my enrolment');
    channel.sendTyping(false);

    expect(socket.frames().slice(1)).toEqual([
      { type: 'message', content: 'I need help with my enrolment' },
      { type: 'typing', is_typing: false, user_name: 'Student' },
    ]);
  });

  test('refuses to send once the socket is gone', () => {
    const { socket, channel } = setup();
    socket.open();
    socket.serverClose();

    expect(channel.send('anyone there?')).toBe(false);
  });

  test('hands validated frames to the handler and drops the rest', () => {
    const { socket, frames } = setup();
    socket.open();

    socket.receive(JSON.stringify({ type: 'message', role: 'human_agent', content: 'Hi, I am Laura', user_name: 'Laura Medina' }));
    socket.receive('not json');
    socket.receive(JSON.stringify({ type: 'unknown' }));
    socket.receive(JSON.stringify({ type: 'typing', user_name: 'Laura Medina', is_typing: true }));

    expect(frames).toEqual([
      { type: 'message', role: 'human_agent', content: 'Hi, I am Laura', user_name: 'Laura Medina' },
      { type: 'typing', user_name: 'Laura Medina', is_typing: true, role: 'human_agent' },
    ]);
  });

  test('reports a close it did not ask for', () => {
    const { socket, onClose } = setup();
    socket.open();

    socket.serverClose();

    expect(onClose).toHaveBeenCalledTimes(1);
  });

  test('stays silent when closed locally', () => {
    const { socket, channel, onClose } = setup();
    socket.open();

    channel.close();
    socket.serverClose();

    expect(socket.closed).toBe(true);
    expect(onClose).not.toHaveBeenCalled();
  });

  test('end asks the hub to hand back to the bot, then closes', () => {
    const { socket, channel } = setup();
    socket.open();

    expect(channel.end()).toBe(true);

    expect(socket.frames().at(-1)).toEqual({ type: 'end' });
    expect(socket.closed).toBe(true);
  });

  test('end reports that the hub was not told while still connecting', () => {
    const { socket, channel } = setup();

    expect(channel.end()).toBe(false);

    expect(socket.sent).toEqual([]);
    expect(socket.closed).toBe(true);
  });

  test('the factory connects to the session path', () => {
    const socket = new FakeChannelSocket();
    const urls: string[] = [];
    const factory = escalationChannelFactory('http://localhost:8080', {
      createSocket: (url) => {
        urls.push(url);
        return socket;
      },
    });

    factory('web_escalated_1', { onFrame: () => undefined, onClose: () => undefined });
    socket.open();

    expect(urls).toEqual(['ws://localhost:8080/ws/chat/web_escalated_1']);
    expect(socket.frames()).toEqual([{ type: 'join', user_name: 'User', role: 'user' }]);
  });
});
