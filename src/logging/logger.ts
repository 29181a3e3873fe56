/**
 * Logger
 *
 * Structured console logging shared by every module.
 */

import type { LogLevel } from '../config';

export interface Logger {
  readonly scope: string;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

export interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  scope: string;
  message: string;
  [key: string]: unknown;
}

export type LogSink = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let currentLevel: LogLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info';

const consoleSink: LogSink = (entry) => {
  const line = `[${entry.scope}] ${JSON.stringify(entry)}`;
  if (entry.level === 'error') {
    console.error(line);
  } else if (entry.level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

let sink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Redirect log output. Passing nothing restores the console sink.
 */
export function setLogSink(next?: LogSink): void {
  sink = next ?? consoleSink;
}

export function createLogger(scope: string): Logger {
  const write = (level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;
    sink({
      ...data,
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
    });
  };

  return {
    scope,
    debug: (message, data) => write('debug', message, data),
    info: (message, data) => write('info', message, data),
    warn: (message, data) => write('warn', message, data),
    error: (message, data) => write('error', message, data),
    child: (name) => createLogger(`${scope}:${name}`),
  };
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
