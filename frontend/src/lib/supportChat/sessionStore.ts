import { logger } from '../../helpers/logger';
import type { KeyValueStore } from './types';

const log = logger.child('session');

export const SESSION_KEYS = {
  sessionId: 'support_chat_session_id',
  lastActivity: 'support_chat_last_activity',
  fingerprint: 'support_chat_page_fingerprint',
} as const;

export const DEFAULT_SESSION_TIMEOUT_MS = 10 * 60_000;

/** djb2 over the navigation path, base36. */
export const pageFingerprint = (path: string): string => {
  let hash = 5381;
  for (let i = 0; i < path.length; i++) {
    hash = ((hash << 5) + hash + path.charCodeAt(i)) >>> 0;
  }
  return hash.toString(36);
};

export type SessionStoreOptions = {
  storage: KeyValueStore | null;
  origin: string;
  pagePath: () => string;
  timeoutMs?: number;
  now?: () => number;
  random?: () => number;
};

type SessionRecord = {
  sessionId: string;
  lastActivity: number;
  fingerprint: string;
};

/**
 * Owns the chat session id. A stored session is reused only while it is fresh and
 * belongs to the current page; otherwise a new one supersedes it. When storage
 * throws, the store keeps the session in memory for the rest of the page's life.
 */
export class SessionStore {
  private readonly timeoutMs: number;
  private readonly now: () => number;
  private readonly random: () => number;
  private storage: KeyValueStore | null;
  private memory: SessionRecord | null = null;

  constructor(private readonly options: SessionStoreOptions) {
    this.storage = options.storage;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  get persistent() {
    return this.storage !== null;
  }

  resolve(): string {
    const fingerprint = pageFingerprint(this.options.pagePath());
    const current = this.read();

    if (current && current.fingerprint === fingerprint && this.now() - current.lastActivity < this.timeoutMs) {
      return current.sessionId;
    }

    return this.start(fingerprint, current?.sessionId ?? null);
  }

  /** Drops the current session and starts a new one for this page. */
  renew(): string {
    return this.start(pageFingerprint(this.options.pagePath()), this.read()?.sessionId ?? null);
  }

  touch() {
    const current = this.read();
    if (!current) return;
    this.write({ ...current, lastActivity: this.now() });
  }

  /** Adopts a session id issued by the server, bound to the current page. */
  replace(sessionId: string) {
    this.write({
      sessionId,
      lastActivity: this.now(),
      fingerprint: pageFingerprint(this.options.pagePath()),
    });
  }

  private start(fingerprint: string, replaced: string | null) {
    const sessionId = this.createId(fingerprint);
    this.write({ sessionId, lastActivity: this.now(), fingerprint });
    log.debug('Started a new session', { sessionId, replaced });
    return sessionId;
  }

  private createId(fingerprint: string) {
    const nonce = this.random().toString(36).slice(2, 10).padEnd(8, '0');
    return `${this.options.origin}_${this.now()}_${nonce}_${fingerprint}`;
  }

  private read(): SessionRecord | null {
    if (!this.storage) return this.memory;
    try {
      const sessionId = this.storage.get(SESSION_KEYS.sessionId);
      const lastActivity = Number(this.storage.get(SESSION_KEYS.lastActivity));
      const fingerprint = this.storage.get(SESSION_KEYS.fingerprint);
      if (!sessionId || !fingerprint || !Number.isFinite(lastActivity)) return null;
      return { sessionId, lastActivity, fingerprint };
    } catch (error) {
      this.degrade(error);
      return this.memory;
    }
  }

  private write(record: SessionRecord) {
    this.memory = record;
    if (!this.storage) return;
    try {
      this.storage.set(SESSION_KEYS.sessionId, record.sessionId);
      this.storage.set(SESSION_KEYS.lastActivity, String(record.lastActivity));
      this.storage.set(SESSION_KEYS.fingerprint, record.fingerprint);
    } catch (error) {
      this.degrade(error);
    }
  }

  private degrade(error: unknown) {
    log.warn('Session storage unavailable; keeping the session in memory', error);
    this.storage = null;
  }
}

/** `localStorage` behind the narrow store interface, or null where the browser refuses it. */
export const browserStorage = (): KeyValueStore | null => {
  try {
    const storage = window.localStorage;
    return {
      get: (key) => storage.getItem(key),
      set: (key, value) => storage.setItem(key, value),
    };
  } catch (error) {
    log.warn('localStorage is not accessible', error);
    return null;
  }
};
