export class ChatRequestError extends Error {
  status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = 'ChatRequestError';
    this.status = status;
  }
}

/** No bytes arrived for longer than the heartbeat timeout. */
export class ConnectionLostError extends Error {
  constructor(idleMs: number) {
    super(`No data received for ${idleMs}ms`);
    this.name = 'ConnectionLostError';
  }
}

export class AttemptTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Attempt timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

export type FailureReason = 'timeout' | 'network' | 'generic';

export const FAILURE_MESSAGES: Record<FailureReason, string> = {
  timeout: 'The server is taking too long to respond. Please try a shorter question.',
  network: 'No connection. Check your internet connection and try again.',
  generic: 'Could not connect to the server. Please try again in a moment.',
};

const NETWORK_FRAGMENTS = [
  'failed to fetch',
  'networkerror',
  'network error',
  'fetch failed',
  'load failed',
  'connection error',
  'econnrefused',
  'enotfound',
];

export const isLikelyNetworkError = (message: string) => {
  const lower = message.toLowerCase();
  return NETWORK_FRAGMENTS.some((fragment) => lower.includes(fragment));
};

export const classifyFailure = (error: unknown): FailureReason => {
  if (error instanceof AttemptTimeoutError || error instanceof ConnectionLostError) return 'timeout';
  if (error instanceof ChatRequestError && error.status !== undefined) {
    return error.status === 408 || error.status === 504 ? 'timeout' : 'generic';
  }
  if (error instanceof Error && isLikelyNetworkError(error.message)) return 'network';
  if (typeof error === 'string' && isLikelyNetworkError(error)) return 'network';
  return 'generic';
};

/** Client errors other than timeouts and rate limits will not improve on retry. */
export const isRetryable = (error: unknown) => {
  if (error instanceof ChatRequestError && error.status !== undefined) {
    return error.status >= 500 || error.status === 408 || error.status === 429;
  }
  return true;
};
