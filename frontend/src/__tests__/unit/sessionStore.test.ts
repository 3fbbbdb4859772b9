import { pageFingerprint, SESSION_KEYS, SessionStore } from '../../lib/supportChat/sessionStore';
import { MemoryStorage } from '../../testUtils/fakes';

const MINUTE = 60_000;

const setup = (options: { path?: string; storage?: MemoryStorage | null } = {}) => {
  let now = 1_000_000;
  let path = options.path ?? '/admissions';
  const storage = options.storage === undefined ? new MemoryStorage() : options.storage;
  const store = new SessionStore({
    storage,
    origin: 'web',
    pagePath: () => path,
    timeoutMs: 10 * MINUTE,
    now: () => now,
  });
  return {
    store,
    storage,
    advance: (ms: number) => { now += ms; },
    navigate: (next: string) => { path = next; },
  };
};

describe('pageFingerprint', () => {
  test('is the base36 djb2 hash of the path', () => {
    expect(pageFingerprint('')).toBe('45h');
    expect(pageFingerprint('/admissions')).toBe(pageFingerprint('/admissions'));
    expect(pageFingerprint('/admissions')).not.toBe(pageFingerprint('/fees'));
  });
});

describe('SessionStore', () => {
  test('creates an id from origin, time, nonce and page fingerprint', () => {
    const { store, storage } = setup();

    const id = store.resolve();

    expect(id).toMatch(new RegExp(`^web_1000000_[0-9a-z]{8}_${pageFingerprint('/admissions')}$`));
    expect(storage?.values.get(SESSION_KEYS.sessionId)).toBe(id);
    expect(storage?.values.get(SESSION_KEYS.lastActivity)).toBe('1000000');
    expect(storage?.values.get(SESSION_KEYS.fingerprint)).toBe(pageFingerprint('/admissions'));
  });

  test('reuses the session while it is fresh', () => {
    const { store, advance } = setup();
    const first = store.resolve();

    advance(5 * MINUTE);

    expect(store.resolve()).toBe(first);
  });

  test('starts a new session after the inactivity timeout', () => {
    const { store, advance } = setup();
    const first = store.resolve();

    advance(11 * MINUTE);
    const second = store.resolve();

    expect(second).not.toBe(first);
    expect(second.startsWith(`web_${1_000_000 + 11 * MINUTE}_`)).toBe(true);
  });

  test('touch keeps the session alive', () => {
    const { store, advance } = setup();
    const first = store.resolve();

    advance(8 * MINUTE);
    store.touch();
    advance(8 * MINUTE);

    expect(store.resolve()).toBe(first);
  });

  test('starts a new session on another page', () => {
    const { store, navigate } = setup();
    const first = store.resolve();

    navigate('/fees');
    const second = store.resolve();

    expect(second).not.toBe(first);
    expect(second.endsWith(`_${pageFingerprint('/fees')}`)).toBe(true);
  });

  test('adopts a session id issued by the server', () => {
    const { store, storage } = setup();
    store.resolve();

    store.replace('web_escalated_1');

    expect(store.resolve()).toBe('web_escalated_1');
    expect(storage?.values.get(SESSION_KEYS.sessionId)).toBe('web_escalated_1');
  });

  test('renew replaces a fresh session with a new one', () => {
    const { store } = setup();
    store.replace('web_escalated_1');

    const renewed = store.renew();

    expect(renewed).not.toBe('web_escalated_1');
    expect(renewed).toMatch(new RegExp(`^web_1000000_[0-9a-z]{8}_${pageFingerprint('/admissions')}$`));
    expect(store.resolve()).toBe(renewed);
  });

  test('falls back to memory when storage throws', () => {
    const storage = new MemoryStorage();
    storage.failing = true;
    const { store } = setup({ storage });

    const first = store.resolve();

    expect(store.persistent).toBe(false);
    expect(store.resolve()).toBe(first);
  });

  test('keeps the current session when storage starts failing later', () => {
    const { store, storage } = setup();
    const first = store.resolve();

    if (storage) storage.failing = true;

    expect(store.resolve()).toBe(first);
    expect(store.persistent).toBe(false);
  });

  test('works without storage', () => {
    const { store, advance } = setup({ storage: null });
    const first = store.resolve();

    advance(MINUTE);

    expect(store.persistent).toBe(false);
    expect(store.resolve()).toBe(first);
  });
});
