/**
 * Minimal Structured Logger
 *
 * Usage:
 *   import { logger } from '@/lib/logger';
 *   logger.info('Client registered', { userId, totalConnections: 2 });
 *   logger.error('Commit failed', error, { ticketId: 42 });
 */

import { env } from '@/lib/env';

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogContext {
  [key: string]: unknown;
}

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Debug logs only outside production unless LOG_LEVEL says otherwise
const MIN_LEVEL: LogLevel = env.LOG_LEVEL ?? (env.NODE_ENV === 'production' ? 'info' : 'debug');

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[MIN_LEVEL];
}

function formatError(error: Error): LogEntry['error'] {
  return {
    name: error.name,
    message: error.message,
    stack: env.NODE_ENV === 'development' ? error.stack : undefined,
  };
}

function createLogEntry(
  level: LogLevel,
  message: string,
  error?: Error,
  context?: LogContext
): LogEntry {
  const entry: LogEntry = {
    level,
    message,
    timestamp: new Date().toISOString(),
  };

  if (context && Object.keys(context).length > 0) {
    entry.context = context;
  }

  if (error) {
    entry.error = formatError(error);
  }

  return entry;
}

function log(level: LogLevel, message: string, error?: Error, context?: LogContext): void {
  if (!shouldLog(level)) return;

  const entry = createLogEntry(level, message, error, context);

  // JSON lines in production for log aggregation
  if (env.NODE_ENV === 'production') {
    const output = JSON.stringify(entry);
    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      default:
        console.log(output);
    }
    return;
  }

  const prefix = `[${level.toUpperCase()}]`;
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';

  switch (level) {
    case 'error':
      console.error(`${prefix} ${message}${contextStr}`, error || '');
      break;
    case 'warn':
      console.warn(`${prefix} ${message}${contextStr}`);
      break;
    case 'debug':
      console.debug(`${prefix} ${message}${contextStr}`);
      break;
    default:
      console.log(`${prefix} ${message}${contextStr}`);
  }
}

/** Normalise anything caught into an Error for the error channel. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
  child(baseContext: LogContext): Logger;
}

export function createLogger(baseContext: LogContext = {}): Logger {
  const withBase = (context?: LogContext): LogContext => ({ ...baseContext, ...context });
  return {
    debug: (message, context) => log('debug', message, undefined, withBase(context)),
    info: (message, context) => log('info', message, undefined, withBase(context)),
    warn: (message, context) => log('warn', message, undefined, withBase(context)),
    error: (message, error, context) => log('error', message, error, withBase(context)),
    /**
     * Create a child logger with preset context
     * @example
     * const hubLogger = logger.child({ component: 'subscription_hub' });
     * hubLogger.info('Client registered'); // includes component in all logs
     */
    child: (childContext) => createLogger(withBase(childContext)),
  };
}

export const logger: Logger = createLogger();
