/* eslint-disable no-console */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

/**
 * Browser-side logger. Same call shape as the server one, without colours or
 * timestamps. Children share their parent's level.
 */
export class Logger {
  constructor(
    private readonly prefix = '',
    private readonly level: { current: LogLevel } = { current: 'warn' },
  ) {}

  debug(message: string, ...args: unknown[]) {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]) {
    this.write('error', message, args);
  }

  child(prefix: string): Logger {
    return new Logger(this.prefix ? `${this.prefix}:${prefix}` : prefix, this.level);
  }

  setLevel(level: LogLevel) {
    this.level.current = level;
  }

  private write(level: LogLevel, message: string, args: unknown[]) {
    if (LEVELS[level] < LEVELS[this.level.current]) return;
    WRITERS[level](this.prefix ? `[${this.prefix}] ${message}` : message, ...args);
  }
}

export const logger = new Logger('support-chat');
