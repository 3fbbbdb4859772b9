export const DEFAULT_HEARTBEAT_TIMEOUT_MS = 30_000;
export const DEFAULT_HEARTBEAT_POLL_MS = 5_000;

export type HeartbeatOptions = {
  onStall: (idleMs: number) => void;
  timeoutMs?: number;
  pollIntervalMs?: number;
  now?: () => number;
};

export interface HeartbeatHandle {
  /** Records activity; call on every received chunk. */
  reset(): void;
  disarm(): void;
  readonly stalled: boolean;
}

/**
 * Watches a stream for silence. The check runs on an interval, so a stall is
 * reported between `timeoutMs` and `timeoutMs + pollIntervalMs` after the last
 * activity, and only once.
 */
export const armHeartbeat = (options: HeartbeatOptions): HeartbeatHandle => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HEARTBEAT_TIMEOUT_MS;
  const pollIntervalMs = options.pollIntervalMs ?? DEFAULT_HEARTBEAT_POLL_MS;
  const now = options.now ?? Date.now;

  let lastActivity = now();
  let stalled = false;
  let timer: ReturnType<typeof setInterval> | null = null;

  const disarm = () => {
    if (timer !== null) {
      clearInterval(timer);
      timer = null;
    }
  };

  timer = setInterval(() => {
    const idleMs = now() - lastActivity;
    if (idleMs < timeoutMs) return;
    stalled = true;
    disarm();
    options.onStall(idleMs);
  }, pollIntervalMs);

  return {
    reset: () => {
      lastActivity = now();
    },
    disarm,
    get stalled() {
      return stalled;
    },
  };
};
