/* eslint-disable no-console */
/**
 * Jest test setup file, shared by the backend and widget suites.
 */

process.env.NODE_ENV = 'test';
process.env.SUPPORT_CHAT_ENV ??= 'test';
process.env.LOG_LEVEL ??= 'debug';
process.env.OLLAMA_ENABLED ??= 'false';

const originalConsole = { ...console };

beforeAll(() => {
  // Suppress console output during tests unless explicitly enabled
  if (!process.env.DEBUG_TESTS) {
    console.log = jest.fn();
    console.info = jest.fn();
    console.warn = jest.fn();
    console.error = jest.fn();
    console.debug = jest.fn();
  }
});

afterAll(() => {
  Object.assign(console, originalConsole);
});
