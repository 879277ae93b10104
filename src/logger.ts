/**
 * Structured logging.
 *
 * Every entry is one JSON line. Components log through child loggers that
 * carry their module name and, inside a lifecycle run, the draft and run IDs.
 * Embedders route entries elsewhere with setLogHandler().
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

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Info, LogLevel.Warn, LogLevel.Error];

/** Warnings and errors go to stderr, the rest to stdout. */
const writeJsonLine: LogHandler = (entry) => {
  const line = JSON.stringify({ level: entry.level, ts: entry.timestamp, msg: entry.message, ...entry.context });
  if (entry.level === LogLevel.Error || entry.level === LogLevel.Warn) {
    process.stderr.write(`${line}\n`);
  } else {
    process.stdout.write(`${line}\n`);
  }
};

let handler: LogHandler = writeJsonLine;
let minLevel: LogLevel = LogLevel.Info;

/** Route entries to `next`. Returns the handler it replaced. */
export function setLogHandler(next: LogHandler): LogHandler {
  const previous = handler;
  handler = next;
  return previous;
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

/** Parse a level name, e.g. from the environment. */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LEVEL_ORDER.find((level) => level === normalized);
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export function createLogger(baseContext: Record<string, unknown> = {}): Logger {
  const emit = (level: LogLevel) => (message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(minLevel)) return;
    handler({ level, message, context: { ...baseContext, ...context }, timestamp: new Date().toISOString() });
  };
  return {
    debug: emit(LogLevel.Debug),
    info: emit(LogLevel.Info),
    warn: emit(LogLevel.Warn),
    error: emit(LogLevel.Error),
    child: (context) => createLogger({ ...baseContext, ...context }),
  };
}

/** Root logger. */
export const logger = createLogger({ component: 'draftpack' });
