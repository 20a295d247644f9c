/** Leveled logger writing one line per entry; errors go to stderr. */
import { env } from '../config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';
export type LogMeta = Record<string, unknown>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: LogMeta;
}

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

// Error instances have no enumerable fields, so JSON.stringify would print {}
function serialise(_key: string, value: unknown): unknown {
  return value instanceof Error ? { name: value.name, message: value.message } : value;
}

export function formatLogLine(entry: LogEntry, format: LogFormat): string {
  const { timestamp, level, message, meta } = entry;
  if (format === 'json') return JSON.stringify({ timestamp, level, message, ...meta }, serialise);
  const head = `[${timestamp}] [${level.toUpperCase()}] ${message}`;
  return meta ? `${head} ${JSON.stringify(meta, serialise)}` : head;
}

function emit(level: LogLevel, message: string, meta?: LogMeta): void {
  if (SEVERITY[level] < SEVERITY[env.LOG_LEVEL]) return;
  const line = formatLogLine({ timestamp: new Date().toISOString(), level, message, meta }, env.LOG_FORMAT);
  const stream = level === 'error' ? process.stderr : process.stdout;
  stream.write(`${line}\n`);
}

export const logger: Record<LogLevel, (message: string, meta?: LogMeta) => void> = {
  debug: (message, meta) => emit('debug', message, meta),
  info:  (message, meta) => emit('info', message, meta),
  warn:  (message, meta) => emit('warn', message, meta),
  error: (message, meta) => emit('error', message, meta),
};
