/**
 * Logger interface for type-safe logging
 */
export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  debug?(message: string, context?: Record<string, unknown>): void;
  child?(scope: string): Logger;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export interface ConsoleLoggerOptions {
  /** Prepended as `[scope]` to every message */
  scope?: string | undefined;
  level?: LogLevel | undefined;
}

/**
 * Console-based logger with an optional scope and minimum level
 */
export class ConsoleLogger implements Logger {
  private readonly scope: string | undefined;
  private readonly level: LogLevel;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.scope = options.scope;
    this.level = options.level ?? 'info';
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context);
  }

  /**
   * Logger for a sub-component sharing this logger's level
   */
  child(scope: string): ConsoleLogger {
    return new ConsoleLogger({
      scope: this.scope ? `${this.scope}:${scope}` : scope,
      level: this.level,
    });
  }

  private write(
    level: Exclude<LogLevel, 'silent'>,
    message: string,
    context?: Record<string, unknown>,
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const line = this.scope ? `[${this.scope}] ${message}` : message;
    if (context !== undefined) {
      console[level](line, context);
    } else {
      console[level](line);
    }
  }
}

/**
 * Scoped console logger
 */
export function createLogger(scope: string, level?: LogLevel): ConsoleLogger {
  return new ConsoleLogger({ scope, level });
}

export const silentLogger: Logger = {
  warn: () => {},
  error: () => {},
  info: () => {},
  debug: () => {},
};
