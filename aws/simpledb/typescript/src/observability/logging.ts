/**
 * Structured logging for SimpleDB calls
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

export interface ConsoleLoggerOptions {
  /** Minimum level written (default: warn). */
  level?: LogLevel;
  /** Component tag printed on every line (default: simpledb). */
  component?: string;
}

const CONSOLE_WRITERS: Record<LogLevel, (line: string) => void> = {
  error: (line) => console.error(line),
  warn: (line) => console.warn(line),
  info: (line) => console.info(line),
  debug: (line) => console.debug(line),
  trace: (line) => console.debug(line),
};

/**
 * Console logger writing one line per entry:
 * `[timestamp] [LEVEL] [component] message {context}`.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly component: string;

  constructor(options: LogLevel | ConsoleLoggerOptions = {}) {
    const resolved = typeof options === 'string' ? { level: options } : options;
    this.minLevel = resolved.level ?? 'warn';
    this.component = resolved.component ?? 'simpledb';
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.write('trace', message, context);
  }

  private write(level: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }
    const suffix = context && Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : '';
    CONSOLE_WRITERS[level](
      `[${new Date().toISOString()}] [${level.toUpperCase()}] [${this.component}] ${message}${suffix}`
    );
  }
}

const discard = (_message: string, _context?: LogContext): void => {};

/**
 * Logger that discards everything
 */
export class NoopLogger implements Logger {
  readonly error = discard;
  readonly warn = discard;
  readonly info = discard;
  readonly debug = discard;
  readonly trace = discard;
}

/**
 * Logs a completed SimpleDB call
 */
export function logOperation(
  logger: Logger,
  action: string,
  requestId: string,
  boxUsage: number,
  durationMs: number
): void {
  logger.debug('SimpleDB request completed', {
    action,
    requestId,
    boxUsage,
    durationMs,
  });
}

/**
 * Logs a failed SimpleDB call
 */
export function logError(logger: Logger, action: string, error: Error): void {
  logger.error('SimpleDB request failed', {
    action,
    errorName: error.name,
    errorMessage: error.message,
  });
}
