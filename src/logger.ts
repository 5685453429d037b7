/**
 * Structured diagnostic logging: one JSON object per line with timestamp, level, message.
 * Errors go to stderr, everything else to stdout. Debug lines are written only when
 * FLOWSTART_LOG_LEVEL=debug.
 */

export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Output module the line is about, when known. */
  module?: string;
  /** Optional extra key-value for context. */
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Threshold from FLOWSTART_LOG_LEVEL; unknown values fall back to info. */
function threshold(): LogLevel {
  const raw = process.env.FLOWSTART_LOG_LEVEL?.toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : 'info';
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] <= LEVEL_ORDER[threshold()];
}

function write(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
  if (!isLevelEnabled(level)) return;
  const record: LogRecord = {
    timestamp: new Date().toISOString(),
    level,
    message,
    ...extra,
  };
  const line = JSON.stringify(record) + '\n';
  const out = level === 'error' ? process.stderr : process.stdout;
  out.write(line);
}

export function logInfo(message: string, extra?: Record<string, unknown>): void {
  write('info', message, extra);
}

export function logWarn(message: string, extra?: Record<string, unknown>): void {
  write('warn', message, extra);
}

export function logError(message: string, extra?: Record<string, unknown>): void {
  write('error', message, extra);
}

export function logDebug(message: string, extra?: Record<string, unknown>): void {
  write('debug', message, extra);
}
