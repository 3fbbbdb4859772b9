import { armHeartbeat } from '../../lib/supportChat/heartbeatMonitor';

describe('armHeartbeat', () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test('stays quiet while chunks keep arriving', () => {
    const onStall = jest.fn();
    const heartbeat = armHeartbeat({ onStall, timeoutMs: 30_000, pollIntervalMs: 5_000 });

    for (let i = 0; i < 6; i++) {
      jest.advanceTimersByTime(10_000);
      heartbeat.reset();
    }

    expect(onStall).not.toHaveBeenCalled();
    expect(heartbeat.stalled).toBe(false);
    heartbeat.disarm();
  });

  test('reports a stall once after the timeout', () => {
    const onStall = jest.fn();
    const heartbeat = armHeartbeat({ onStall, timeoutMs: 30_000, pollIntervalMs: 5_000 });

    jest.advanceTimersByTime(29_999);
    expect(onStall).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1);
    expect(onStall).toHaveBeenCalledTimes(1);
    expect(onStall).toHaveBeenCalledWith(30_000);
    expect(heartbeat.stalled).toBe(true);

    jest.advanceTimersByTime(60_000);
    expect(onStall).toHaveBeenCalledTimes(1);
  });

  test('measures silence from the last reset', () => {
    const onStall = jest.fn();
    const heartbeat = armHeartbeat({ onStall, timeoutMs: 30_000, pollIntervalMs: 5_000 });

    jest.advanceTimersByTime(25_000);
    heartbeat.reset();
    jest.advanceTimersByTime(29_000);
    expect(onStall).not.toHaveBeenCalled();

    jest.advanceTimersByTime(1_000);
    expect(onStall).toHaveBeenCalledWith(30_000);
  });

  test('never fires once disarmed', () => {
    const onStall = jest.fn();
    const heartbeat = armHeartbeat({ onStall, timeoutMs: 1_000, pollIntervalMs: 100 });

    heartbeat.disarm();
    jest.advanceTimersByTime(10_000);

    expect(onStall).not.toHaveBeenCalled();
  });
});
