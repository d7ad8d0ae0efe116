import { appendFileSync, mkdirSync } from 'fs';

import { safeJsonStringify } from './json-utils.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  meta?: unknown;
}

const LOG_DIR = process.env.LOG_DIR ?? './logs';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL ?? 'info';
  return isLogLevel(level) ? level : 'info';
}

function shouldLog(level: LogLevel): boolean {
  if (level === 'debug') {
    return process.env.DEBUG === 'true' || getLogLevel() === 'debug';
  }
  return LOG_LEVELS[level] >= LOG_LEVELS[getLogLevel()];
}

function writeToFile(entry: LogEntry): void {
  if (process.env.DISABLE_FILE_LOGGING === 'true') {
    return;
  }
  try {
    mkdirSync(LOG_DIR, { recursive: true });
    appendFileSync(getCurrentLogFile(), safeJsonStringify(entry) + '\n');
  } catch (err) {
    console.error('Failed to write to log file:', err);
  }
}

function logToConsole(entry: LogEntry): void {
  const prefix = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  const args: unknown[] = entry.meta === undefined ? [prefix] : [prefix, entry.meta];
  if (entry.level === 'error') {
    console.error(...args);
  } else if (entry.level === 'warn') {
    console.warn(...args);
  } else {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}

function getCurrentLogFile(): string {
  const dateStr = new Date().toISOString().split('T')[0]; // YYYY-MM-DD
  return `${LOG_DIR}/queue-${dateStr}.log`;
}

function write(level: LogLevel, message: string, meta?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }
  const entry: LogEntry = { timestamp: new Date().toISOString(), level, message, meta };
  writeToFile(entry);
  logToConsole(entry);
}

export const logger = {
  debug: (message: string, meta?: unknown): void => write('debug', message, meta),
  info: (message: string, meta?: unknown): void => write('info', message, meta),
  warn: (message: string, meta?: unknown): void => write('warn', message, meta),
  error: (message: string, meta?: unknown): void => write('error', message, meta),
};
