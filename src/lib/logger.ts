/**
 * Structured logging utility
 * Writes one JSON object per line; errors go to stderr
 */

import { settings, type LogLevel } from '../config/settings.js';

export type LogContext = Record<string, unknown>;

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  context?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Create a logger that drops entries below `minLevel`
 */
export function createLogger(minLevel: LogLevel, service: string): Logger {
  const log = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      service,
    };

    if (context && Object.keys(context).length > 0) {
      entry.context = context;
    }

    const output = JSON.stringify(entry);
    if (level === 'error') {
      console.error(output);
    } else {
      console.log(output);
    }
  };

  return {
    debug: (message, context) => log('debug', message, context),
    info: (message, context) => log('info', message, context),
    warn: (message, context) => log('warn', message, context),
    error: (message, context) => log('error', message, context),
  };
}

/**
 * Render an unknown thrown value for a log context
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const logger: Logger = createLogger(settings.logLevel, settings.serviceName);
