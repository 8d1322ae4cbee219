/**
 * Logger abstraction.
 *
 * Structured, level-based logging with context. Loggers are created per
 * application context and handed to the components that need them; the
 * only state they share is the sink they write to.
 */

export enum LogLevel {
  Debug = 'debug',
  Info = 'info',
  Warn = 'warn',
  Error = 'error',
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  timestamp: string;
}

export type LogHandler = (entry: LogEntry) => void;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  [LogLevel.Debug]: 0,
  [LogLevel.Info]: 1,
  [LogLevel.Warn]: 2,
  [LogLevel.Error]: 3,
};

/** Default log handler writes structured JSON to console. */
export const consoleLogHandler: LogHandler = (entry: LogEntry) => {
  const output = {
    level: entry.level,
    ts: entry.timestamp,
    msg: entry.message,
    ...entry.context,
  };
  switch (entry.level) {
    case LogLevel.Error:
      console.error(JSON.stringify(output));
      break;
    case LogLevel.Warn:
      console.warn(JSON.stringify(output));
      break;
    default:
      console.log(JSON.stringify(output));
  }
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
  /** Number of entries the sink failed to accept. */
  droppedEntries(): number;
}

export interface LoggerOptions {
  handler?: LogHandler;
  minLevel?: LogLevel;
  context?: Record<string, unknown>;
}

interface LogSink {
  handler: LogHandler;
  minLevel: LogLevel;
  dropped: number;
}

/** Parse a level name (case-insensitive); returns undefined for unknown names. */
export function parseLogLevel(value: string): LogLevel | undefined {
  const normalized = value.trim().toLowerCase();
  return Object.values(LogLevel).find((level) => level === normalized);
}

function emit(sink: LogSink, level: LogLevel, message: string, context: Record<string, unknown>): void {
  if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[sink.minLevel]) return;
  try {
    sink.handler({
      level,
      message,
      context,
      timestamp: new Date().toISOString(),
    });
  } catch {
    // A failing sink never reaches the caller.
    sink.dropped += 1;
  }
}

function bind(sink: LogSink, baseContext: Record<string, unknown>): Logger {
  return {
    debug: (msg, ctx) => emit(sink, LogLevel.Debug, msg, { ...baseContext, ...ctx }),
    info: (msg, ctx) => emit(sink, LogLevel.Info, msg, { ...baseContext, ...ctx }),
    warn: (msg, ctx) => emit(sink, LogLevel.Warn, msg, { ...baseContext, ...ctx }),
    error: (msg, ctx) => emit(sink, LogLevel.Error, msg, { ...baseContext, ...ctx }),
    child: (childCtx) => bind(sink, { ...baseContext, ...childCtx }),
    droppedEntries: () => sink.dropped,
  };
}

/** Create a logger; children share its sink and level. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const sink: LogSink = {
    handler: options.handler ?? consoleLogHandler,
    minLevel: options.minLevel ?? LogLevel.Info,
    dropped: 0,
  };
  return bind(sink, options.context ?? {});
}

/** Render an unknown thrown value for a log context. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}
