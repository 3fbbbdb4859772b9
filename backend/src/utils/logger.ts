/* eslint-disable no-console */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerOptions {
  prefix?: string;
  timestamp?: boolean;
  minLevel?: LogLevel;
  colors?: boolean;
}

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS: Record<LogLevel | 'reset', string> = {
  debug: '\x1b[36m', // cyan
  info: '\x1b[32m', // green
  warn: '\x1b[33m', // yellow
  error: '\x1b[31m', // red
  reset: '\x1b[0m',
};

const WRITERS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

const isLogLevel = (value: string): value is LogLevel => value in LEVELS;

export const parseLogLevel = (value: string | undefined): LogLevel | null => {
  const normalized = String(value || '').trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : null;
};

export class Logger {
  private readonly prefix: string;
  private readonly timestamp: boolean;
  private readonly minLevel: LogLevel;
  private readonly colors: boolean;

  constructor(options: LoggerOptions = {}) {
    this.prefix = options.prefix || '';
    this.timestamp = options.timestamp ?? true;
    this.minLevel = options.minLevel || 'debug';
    this.colors = options.colors ?? true;
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  child(prefix: string): Logger {
    return new Logger({
      prefix: this.prefix ? `${this.prefix}:${prefix}` : prefix,
      timestamp: this.timestamp,
      minLevel: this.minLevel,
      colors: this.colors,
    });
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private write(level: LogLevel, message: string, args: unknown[]) {
    if (!this.isLevelEnabled(level)) return;
    const formatted = this.format(level, message);
    const line = this.colors ? `${COLORS[level]}${formatted}${COLORS.reset}` : formatted;
    WRITERS[level](line, ...args);
  }

  private format(level: LogLevel, message: string): string {
    const parts: string[] = [];

    if (this.timestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.prefix) {
      parts.push(`[${this.prefix}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);

    return parts.join(' ');
  }
}

export const logger = new Logger({
  timestamp: true,
  colors: process.stdout.isTTY === true,
  minLevel: parseLogLevel(process.env.LOG_LEVEL)
    ?? (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
});
