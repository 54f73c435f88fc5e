/**
 * Structured JSON Logger
 *
 * Provides structured logging with levels, context and data fields.
 * Outputs JSON in production, human-readable in development.
 * Loggers are created once at process start and handed to each component.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
    code?: string;
  };
}

export type LogSink = (level: LogLevel, line: string, entry: LogEntry) => void;

export type LoggerOptions = {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  sink?: LogSink;
};

export type LogOptions = { data?: Record<string, unknown>; error?: unknown };

export interface Logger {
  debug(message: string, opts?: LogOptions): void;
  info(message: string, opts?: LogOptions): void;
  warn(message: string, opts?: LogOptions): void;
  error(message: string, opts?: LogOptions): void;
  child(context: string): Logger;
}

export const isLogLevel = (value: string | undefined): value is LogLevel =>
  value !== undefined && Object.hasOwn(LOG_LEVELS, value);

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case 'error':
      console.error(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'debug':
      console.debug(line);
      break;
    default:
      console.log(line);
  }
};

function formatEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }

  // Human-readable for development
  const prefix = entry.context ? `[${entry.context}] ` : '';
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const errStr = entry.error ? ` err=${entry.error.message}` : '';
  return `${entry.level.toUpperCase()} ${prefix}${entry.message}${dataStr}${errStr}`;
}

function readCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function serializeError(err: unknown): LogEntry['error'] | undefined {
  if (!err) return undefined;
  if (err instanceof Error) {
    return {
      message: err.message,
      stack: err.stack,
      code: readCode(err),
    };
  }
  if (typeof err === 'object' && 'message' in err && typeof err.message === 'string') {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
    return { message: err.message, code };
  }
  return { message: String(err) };
}

const defaultOptions = (): Required<LoggerOptions> => {
  const envLevel = process.env.LOG_LEVEL;
  return {
    level: isLogLevel(envLevel) ? envLevel : 'info',
    format: process.env.NODE_ENV === 'production' ? 'json' : 'pretty',
    sink: consoleSink,
  };
};

/**
 * Create a logger with a fixed context prefix.
 *
 * @example
 * const log = createLogger('Applier', { level: 'debug' });
 * log.info('Created resource', { data: { kind: 'StatefulSet' } });
 */
export function createLogger(context: string, options: LoggerOptions = {}): Logger {
  const resolved = { ...defaultOptions(), ...options };

  const log = (level: LogLevel, message: string, opts?: LogOptions) => {
    if (LOG_LEVELS[level] < LOG_LEVELS[resolved.level]) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context,
      data: opts?.data,
      error: serializeError(opts?.error),
    };

    resolved.sink(level, formatEntry(entry, resolved.format), entry);
  };

  return {
    debug: (message: string, opts?: LogOptions) => log('debug', message, opts),
    info: (message: string, opts?: LogOptions) => log('info', message, opts),
    warn: (message: string, opts?: LogOptions) => log('warn', message, opts),
    error: (message: string, opts?: LogOptions) => log('error', message, opts),
    child: (childContext: string) => createLogger(`${context}:${childContext}`, resolved),
  };
}
