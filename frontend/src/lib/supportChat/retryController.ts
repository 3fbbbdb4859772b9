import { logger } from '../../helpers/logger';
import {
  AttemptTimeoutError,
  classifyFailure,
  FAILURE_MESSAGES,
  isRetryable,
  type FailureReason,
} from './errors';

const log = logger.child('retry');

export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_ATTEMPT_TIMEOUT_MS = 60_000;
export const DEFAULT_BACKOFF_MS = 1_000;

export type AttemptContext = {
  /** Aborted when this attempt times out or the caller cancels. */
  signal: AbortSignal;
  attempt: number;
};

export type RetryNotice = {
  attempt: number;
  totalAttempts: number;
  delayMs: number;
  reason: FailureReason;
};

export type RetryOptions = {
  maxRetries?: number;
  perAttemptTimeoutMs?: number;
  backoffMs?: number;
  /** Aborting it cancels the whole operation; that is never retried. */
  signal?: AbortSignal;
  onRetry?: (notice: RetryNotice) => void;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type RetryOutcome<T> =
  | { status: 'succeeded'; value: T; attempts: number }
  | { status: 'cancelled'; attempts: number }
  | { status: 'failed'; reason: FailureReason; message: string; attempts: number; error: unknown };

export const sleep = (ms: number, signal?: AbortSignal) => new Promise<void>((resolve) => {
  if (signal?.aborted) {
    resolve();
    return;
  }
  const done = () => {
    clearTimeout(timer);
    signal?.removeEventListener('abort', done);
    resolve();
  };
  const timer = setTimeout(done, ms);
  signal?.addEventListener('abort', done, { once: true });
});

/** Settles with the promise, or rejects with the signal's reason if it aborts first. */
const untilAborted = <T>(promise: Promise<T>, signal: AbortSignal) => new Promise<T>((resolve, reject) => {
  const onAbort = () => reject(signal.reason);
  if (signal.aborted) onAbort();
  else signal.addEventListener('abort', onAbort, { once: true });
  promise.then(
    (value) => {
      signal.removeEventListener('abort', onAbort);
      resolve(value);
    },
    (error: unknown) => {
      signal.removeEventListener('abort', onAbort);
      reject(error);
    },
  );
});

/**
 * Runs `attemptFn` up to `maxRetries + 1` times. Attempt n > 1 starts after
 * `backoffMs * n`. Each attempt gets its own abort scope bound to
 * `perAttemptTimeoutMs`; a timed-out attempt counts as a `timeout` failure.
 */
export const executeWithRetry = async <T>(
  attemptFn: (context: AttemptContext) => Promise<T>,
  options: RetryOptions = {},
): Promise<RetryOutcome<T>> => {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const timeoutMs = options.perAttemptTimeoutMs ?? DEFAULT_ATTEMPT_TIMEOUT_MS;
  const backoffMs = options.backoffMs ?? DEFAULT_BACKOFF_MS;
  const wait = options.sleep ?? sleep;
  const parent = options.signal;
  const totalAttempts = maxRetries + 1;

  let lastReason: FailureReason = 'generic';
  let lastError: unknown = null;
  let attemptsMade = 0;

  for (let attempt = 1; attempt <= totalAttempts; attempt++) {
    if (attempt > 1) {
      const delayMs = backoffMs * attempt;
      options.onRetry?.({ attempt, totalAttempts, delayMs, reason: lastReason });
      await wait(delayMs, parent);
    }
    if (parent?.aborted) return { status: 'cancelled', attempts: attempt - 1 };

    attemptsMade = attempt;
    const scope = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      scope.abort(new AttemptTimeoutError(timeoutMs));
    }, timeoutMs);
    const forwardAbort = () => scope.abort(parent?.reason);
    parent?.addEventListener('abort', forwardAbort, { once: true });

    try {
      const value = await untilAborted(attemptFn({ signal: scope.signal, attempt }), scope.signal);
      return { status: 'succeeded', value, attempts: attempt };
    } catch (error) {
      if (parent?.aborted) {
        log.debug('Cancelled by caller', { attempt });
        return { status: 'cancelled', attempts: attempt };
      }
      lastError = error;
      lastReason = timedOut ? 'timeout' : classifyFailure(error);
      log.warn(`Attempt ${attempt}/${totalAttempts} failed (${lastReason})`, error);
      if (!isRetryable(error)) break;
    } finally {
      clearTimeout(timer);
      parent?.removeEventListener('abort', forwardAbort);
    }
  }

  return {
    status: 'failed',
    reason: lastReason,
    message: FAILURE_MESSAGES[lastReason],
    attempts: attemptsMade,
    error: lastError,
  };
};
