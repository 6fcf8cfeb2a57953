/**
 * Console Logger - Default logger for lexicard services.
 *
 * Provides level-filtered console output tagged with a component prefix.
 * Services accept any `Logger`, so hosts can route output elsewhere.
 *
 * @packageDocumentation
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Minimal structured logger contract used across the library.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

/** Numeric log level for comparison */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** Console method per level, looked up at call time */
const CONSOLE_METHODS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Console-based logger with level filtering.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: number;

  constructor(
    private readonly prefix: string,
    private readonly level: LogLevel = 'info'
  ) {
    this.minLevel = LOG_LEVEL_ORDER[level];
  }

  /**
   * Logger for a sub-component sharing this logger's level.
   */
  child(prefix: string): ConsoleLogger {
    return new ConsoleLogger(`${this.prefix}:${prefix}`, this.level);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context === undefined ? [] : [context]);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context === undefined ? [] : [context]);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context === undefined ? [] : [context]);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const details: unknown[] = [];
    if (error !== undefined) details.push(error);
    if (context !== undefined) details.push(context);
    this.emit('error', message, details);
  }

  private emit(level: LogLevel, message: string, details: unknown[]): void {
    if (this.minLevel > LOG_LEVEL_ORDER[level]) {
      return;
    }
    CONSOLE_METHODS[level](`[${this.prefix}] ${message}`, ...details);
  }
}
