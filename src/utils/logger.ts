export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogThreshold = LogLevel | 'silent';

export const LOG_THRESHOLDS: readonly LogThreshold[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  service: string;
  message: string;
  requestId?: string;
  metadata?: Record<string, unknown>;
  error?: SerializedError;
}

export type LogSink = (level: LogLevel, line: string) => void;

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>, error?: unknown): void;
  error(message: string, metadata?: Record<string, unknown>, error?: unknown): void;
  child(bindings: { requestId: string }): Logger;
}

export interface LoggerOptions {
  level?: LogThreshold;
  sink?: LogSink;
  requestId?: string;
}

export function isLogThreshold(value: string): value is LogThreshold {
  return (LOG_THRESHOLDS as readonly string[]).includes(value);
}

export function serializeError(error: unknown): SerializedError | undefined {
  if (error == null) {
    return undefined;
  }

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'string') {
    return { name: 'Error', message: error };
  }

  return { name: 'UnknownError', message: String(error) };
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/**
 * Structured logger writing one JSON line per entry.
 */
export function createLogger(service: string, options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? 'info';
  const sink = options.sink ?? consoleSink;

  const write = (level: LogLevel, message: string, metadata?: Record<string, unknown>, error?: unknown) => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      service,
      message,
      requestId: options.requestId,
      metadata,
      error: serializeError(error),
    };
    sink(level, JSON.stringify(entry));
  };

  return {
    debug: (message, metadata) => write('debug', message, metadata),
    info: (message, metadata) => write('info', message, metadata),
    warn: (message, metadata, error) => write('warn', message, metadata, error),
    error: (message, metadata, error) => write('error', message, metadata, error),
    child: ({ requestId }) => createLogger(service, { ...options, requestId }),
  };
}
