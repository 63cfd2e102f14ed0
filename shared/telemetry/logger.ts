export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  scope: string;
  message: string;
  build_id: string;
  ts: number;
  data?: Record<string, unknown>;
}

export type LogSink = (line: string, entry: LogEntry) => void;

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  sink?: LogSink;
  buildId?: string;
  minLevel?: LogLevel;
  clock?: () => number;
}

// user-authored text never reaches the logs
const SENSITIVE_KEYS = ['rawInput', 'text', 'content', 'notes'];

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
});

export function redactSensitive(entry: LogEntry): LogEntry {
  const clone: LogEntry = { ...entry };
  if (clone.data) {
    const data = { ...clone.data };
    for (const key of SENSITIVE_KEYS) {
      if (key in data) {
        data[key] = '[redacted]';
      }
    }
    clone.data = data;
  }
  return clone;
}

export function formatLog(entry: LogEntry): string {
  const redacted = redactSensitive(entry);
  return JSON.stringify(redacted);
}

const consoleSink: LogSink = (line, entry) => {
  if (entry.level === 'error') {
    console.error(line);
  } else if (entry.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const buildId = options.buildId ?? 'dev';
  const minRank = LEVEL_RANK[options.minLevel ?? 'info'];
  const clock = options.clock ?? (() => Date.now());

  const write = (level: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_RANK[level] < minRank) {
      return;
    }
    const entry: LogEntry = { level, scope, message, build_id: buildId, ts: clock() };
    if (data && Object.keys(data).length > 0) {
      entry.data = data;
    }
    const redacted = redactSensitive(entry);
    try {
      sink(JSON.stringify(redacted), redacted);
    } catch {
      // logging must never break the caller
    }
  };

  return {
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (childScope) => createLogger(`${scope}.${childScope}`, options),
  };
}

/** Logger that drops everything; the default for components built without one. */
export const silentLogger: Logger = createLogger('silent', { sink: () => undefined, minLevel: 'error' });
