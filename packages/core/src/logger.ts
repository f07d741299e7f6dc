/**
 * Scoped, level-filtered logging to stderr with an in-memory history.
 * stdout is left to command output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface LogEntry {
  timestamp: number;
  level: Exclude<LogLevel, 'silent'>;
  scope: string;
  message: string;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const MAX_ENTRIES = 200;
const buffer: LogEntry[] = [];
const listeners: Array<(entry: LogEntry) => void> = [];
let threshold: LogLevel = 'warn';

function stringify(arg: unknown): string {
  if (typeof arg === 'string') return arg;
  if (arg instanceof Error) return arg.message;
  return JSON.stringify(arg);
}

function push(level: LogEntry['level'], scope: string, args: unknown[]): void {
  const message = args.map(stringify).join(' ');
  const entry: LogEntry = { timestamp: Date.now(), level, scope, message };
  buffer.push(entry);
  if (buffer.length > MAX_ENTRIES) buffer.shift();
  for (const cb of listeners) cb(entry);

  if (LOG_LEVELS[level] >= LOG_LEVELS[threshold]) {
    console.error(`[${scope.toUpperCase()}]:`, message);
  }
}

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (...args) => push('debug', scope, args),
    info: (...args) => push('info', scope, args),
    warn: (...args) => push('warn', scope, args),
    error: (...args) => push('error', scope, args),
  };
}

export function getLogHistory(): LogEntry[] {
  return [...buffer];
}

export function clearLogs(): void {
  buffer.length = 0;
}

export function onLog(callback: (entry: LogEntry) => void): () => void {
  listeners.push(callback);
  return () => {
    const idx = listeners.indexOf(callback);
    if (idx >= 0) listeners.splice(idx, 1);
  };
}
