import { ChatRequestError, FAILURE_MESSAGES } from '../../lib/supportChat/errors';
import { executeWithRetry, type AttemptContext, type RetryNotice } from '../../lib/supportChat/retryController';

const neverSettles = ({ signal }: AttemptContext) => new Promise<string>((_resolve, reject) => {
  signal.addEventListener('abort', () => reject(signal.reason), { once: true });
});

const recordSleeps = () => {
  const delays: number[] = [];
  return { delays, sleep: async (ms: number) => { delays.push(ms); } };
};

describe('executeWithRetry', () => {
  test('gives up with the timeout message after every attempt times out', async () => {
    const attemptFn = jest.fn(neverSettles);
    const notices: RetryNotice[] = [];
    const { delays, sleep } = recordSleeps();

    const outcome = await executeWithRetry(attemptFn, {
      maxRetries: 2,
      perAttemptTimeoutMs: 10,
      sleep,
      onRetry: (notice) => notices.push(notice),
    });

    expect(attemptFn).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({ status: 'failed', reason: 'timeout', message: FAILURE_MESSAGES.timeout, attempts: 3 });
    expect(delays).toEqual([2_000, 3_000]);
    expect(notices.map(({ attempt, totalAttempts, reason }) => [attempt, totalAttempts, reason])).toEqual([
      [2, 3, 'timeout'],
      [3, 3, 'timeout'],
    ]);
  });

  test('retries a network failure and returns the later success', async () => {
    const attemptFn = jest.fn<Promise<string>, [AttemptContext]>()
      .mockRejectedValueOnce(new TypeError('Failed to fetch'))
      .mockResolvedValueOnce('answer');
    const notices: RetryNotice[] = [];

    const outcome = await executeWithRetry(attemptFn, { sleep: recordSleeps().sleep, onRetry: (n) => notices.push(n) });

    expect(outcome).toEqual({ status: 'succeeded', value: 'answer', attempts: 2 });
    expect(notices).toEqual([{ attempt: 2, totalAttempts: 3, delayMs: 2_000, reason: 'network' }]);
    expect(attemptFn.mock.calls.map(([context]) => context.attempt)).toEqual([1, 2]);
  });

  test('reports the network message when the connection never comes back', async () => {
    const attemptFn = jest.fn<Promise<string>, [AttemptContext]>().mockRejectedValue(new TypeError('Failed to fetch'));

    const outcome = await executeWithRetry(attemptFn, { sleep: recordSleeps().sleep });

    expect(attemptFn).toHaveBeenCalledTimes(3);
    expect(outcome).toMatchObject({ status: 'failed', reason: 'network', message: FAILURE_MESSAGES.network });
  });

  test('does not retry a client error', async () => {
    const error = new ChatRequestError('Invalid request body', 400);
    const attemptFn = jest.fn<Promise<string>, [AttemptContext]>().mockRejectedValue(error);

    const outcome = await executeWithRetry(attemptFn, { sleep: recordSleeps().sleep });

    expect(attemptFn).toHaveBeenCalledTimes(1);
    expect(outcome).toEqual({
      status: 'failed',
      reason: 'generic',
      message: FAILURE_MESSAGES.generic,
      attempts: 1,
      error,
    });
  });

  test('retries server errors', async () => {
    const attemptFn = jest.fn<Promise<string>, [AttemptContext]>().mockRejectedValue(new ChatRequestError('Bad gateway', 502));

    const outcome = await executeWithRetry(attemptFn, { maxRetries: 1, sleep: recordSleeps().sleep });

    expect(attemptFn).toHaveBeenCalledTimes(2);
    expect(outcome).toMatchObject({ status: 'failed', reason: 'generic', attempts: 2 });
  });

  test('treats a gateway timeout status as a timeout', async () => {
    const attemptFn = jest.fn<Promise<string>, [AttemptContext]>().mockRejectedValue(new ChatRequestError('Gateway Timeout', 504));

    const outcome = await executeWithRetry(attemptFn, { maxRetries: 0 });

    expect(outcome).toMatchObject({ status: 'failed', reason: 'timeout', message: FAILURE_MESSAGES.timeout, attempts: 1 });
  });

  test('is cancelled, not failed, when the caller aborts an attempt', async () => {
    const controller = new AbortController();
    const attemptFn = jest.fn((context: AttemptContext) => {
      const pending = neverSettles(context);
      controller.abort();
      return pending;
    });

    const outcome = await executeWithRetry(attemptFn, { signal: controller.signal, sleep: recordSleeps().sleep });

    expect(outcome).toEqual({ status: 'cancelled', attempts: 1 });
    expect(attemptFn).toHaveBeenCalledTimes(1);
  });

  test('is cancelled when the caller aborts during the backoff', async () => {
    const controller = new AbortController();
    const attemptFn = jest.fn<Promise<string>, [AttemptContext]>().mockRejectedValue(new TypeError('Failed to fetch'));

    const outcome = await executeWithRetry(attemptFn, {
      signal: controller.signal,
      sleep: async () => { controller.abort(); },
    });

    expect(outcome).toEqual({ status: 'cancelled', attempts: 1 });
    expect(attemptFn).toHaveBeenCalledTimes(1);
  });

  test('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const attemptFn = jest.fn<Promise<string>, [AttemptContext]>().mockResolvedValue('never');

    const outcome = await executeWithRetry(attemptFn, { signal: controller.signal });

    expect(outcome).toEqual({ status: 'cancelled', attempts: 0 });
    expect(attemptFn).not.toHaveBeenCalled();
  });
});
