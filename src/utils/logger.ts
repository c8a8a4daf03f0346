/**
 * Structured console logger
 * Minimum level comes from LOG_LEVEL (DEBUG, INFO, WARN, ERROR)
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function minimumLevel(): LogLevel {
  const configured = (process.env.LOG_LEVEL || '').toUpperCase();
  return isLogLevel(configured) ? configured : LogLevel.INFO;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimumLevel()];
}

export function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return error;
}

function buildEntry(level: LogLevel, message: string, metadata?: Record<string, unknown>): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    metadata,
  };
}

export const logger = {
  debug(message: string, metadata?: Record<string, unknown>): void {
    if (!enabled(LogLevel.DEBUG)) return;
    console.log(formatLog(buildEntry(LogLevel.DEBUG, message, metadata)));
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    if (!enabled(LogLevel.INFO)) return;
    console.log(formatLog(buildEntry(LogLevel.INFO, message, metadata)));
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    if (!enabled(LogLevel.WARN)) return;
    console.warn(formatLog(buildEntry(LogLevel.WARN, message, metadata)));
  },

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    if (!enabled(LogLevel.ERROR)) return;
    console.error(formatLog(buildEntry(LogLevel.ERROR, message, {
      ...metadata,
      error: serializeError(error),
    })));
  },
};
