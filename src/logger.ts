import { createHash } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';
export type LogFormat = 'pretty' | 'json';

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  error?: {
    name?: string;
    message?: string;
    stack?: string;
    cause?: string;
  };
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
  log(level: LogLevel, message: string, context?: LogContext, error?: unknown): void;
  child(additionalContext: LogContext): Logger;
}

export interface LoggerOptions {
  level: LogThreshold;
  format: LogFormat;
  /** Defaults to the console. */
  write?: (level: LogLevel, line: string) => void;
}

const LOG_LEVELS: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const HASHED_FIELDS = ['trackingnumber', 'tracking_number'];

export function hashTrackingNumber(value: string): string {
  return createHash('sha256').update(value.trim()).digest('hex').slice(0, 12);
}

function sanitizeContext(context: LogContext): LogContext {
  const sanitized: LogContext = {};
  for (const [key, value] of Object.entries(context)) {
    if (HASHED_FIELDS.includes(key.toLowerCase()) && typeof value === 'string') {
      sanitized[key] = hashTrackingNumber(value);
    } else if (typeof value === 'string' && value.length > 500) {
      sanitized[key] = value.substring(0, 200) + '...[TRUNCATED]';
    } else {
      sanitized[key] = value;
    }
  }
  return sanitized;
}

function serializeError(error: unknown): LogEntry['error'] {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(error.cause !== undefined && {
        cause: error.cause instanceof Error ? error.cause.message : String(error.cause),
      }),
    };
  }
  return { message: String(error) };
}

function formatEntry(entry: LogEntry, format: LogFormat): string {
  if (format === 'json') {
    return JSON.stringify(entry);
  }
  const { timestamp, level, message, requestId, ...rest } = entry;
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`;
  const reqId = typeof requestId === 'string' ? ` [${requestId.substring(0, 8)}]` : '';
  if (Object.keys(rest).length > 0) {
    return `${prefix}${reqId} ${message} ${JSON.stringify(rest)}`;
  }
  return `${prefix}${reqId} ${message}`;
}

function consoleWrite(level: LogLevel, line: string): void {
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export function createLogger(options: LoggerOptions, baseContext: LogContext = {}): Logger {
  const write = options.write ?? consoleWrite;

  const log = (level: LogLevel, message: string, context?: LogContext, error?: unknown): void => {
    if (LOG_LEVELS[level] < LOG_LEVELS[options.level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
    };
    const merged = { ...baseContext, ...context };
    if (Object.keys(merged).length > 0) {
      Object.assign(entry, sanitizeContext(merged));
    }
    if (error !== undefined) {
      entry.error = serializeError(error);
    }
    write(level, formatEntry(entry, options.format));
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, error, context) => log('error', message, context, error),
    log,
    child: (additionalContext) =>
      createLogger(options, { ...baseContext, ...additionalContext }),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent', format: 'json' });
