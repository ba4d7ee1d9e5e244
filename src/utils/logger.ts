/**
 * Console logger with a minimum level
 * Debug and info go to stdout, warnings and errors to stderr
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

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

let minimumLevel: LogLevel = LogLevel.INFO;

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function parseLogLevel(value: string | undefined, defaultValue: LogLevel = LogLevel.INFO): LogLevel {
  if (!value) return defaultValue;
  const upper = value.trim().toUpperCase();
  const match = Object.values(LogLevel).find(level => level === upper);
  return match ?? defaultValue;
}

export function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

function write(level: LogLevel, message: string, metadata?: Record<string, unknown>): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;

  const line = formatLog({
    level,
    message,
    timestamp: new Date().toISOString(),
    metadata,
  });

  if (level === LogLevel.WARN) {
    console.warn(line);
  } else if (level === LogLevel.ERROR) {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message || error.name : String(error);
}

export const logger = {
  debug(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.DEBUG, message, metadata);
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.INFO, message, metadata);
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    write(LogLevel.WARN, message, metadata);
  },

  error(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void {
    write(LogLevel.ERROR, message, {
      ...metadata,
      error: error instanceof Error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : error,
    });
  },
};
