/**
 * Sanitized Structured Logger
 *
 * One JSON line per entry on the console. Messages pass through
 * sanitizePII() and structured data through sanitizeObject(), so applicant
 * identifiers never reach log storage in clear text.
 *
 * A logger can carry bound context (e.g. the account it works on), merged
 * under each entry's `data`:
 *
 *   const log = createLogger('conflict-alert', { recordId });
 *   log.warn('Change hint failed', { error: sanitizeError(err) });
 *
 * LOG_LEVEL (debug | info | warn | error) sets the minimum level; the
 * default is info in production and debug elsewhere.
 */

import { sanitizePII, sanitizeObject } from './sanitizer';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  service: string;
  message: string;
  data?: unknown;
  timestamp: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: line => console.log(line),
  info: line => console.log(line),
  warn: line => console.warn(line),
  error: line => console.error(line),
};

function minimumLevel(): LogLevel {
  const val = process.env.LOG_LEVEL?.toLowerCase().trim();
  if (val === 'debug' || val === 'info' || val === 'warn' || val === 'error') return val;
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function mergeData(context: LogContext, data: unknown): unknown {
  if (Object.keys(context).length === 0) return data;
  if (data === undefined) return context;
  if (typeof data === 'object' && data !== null && !Array.isArray(data)) {
    return { ...context, ...data };
  }
  return { ...context, value: data };
}

/**
 * Create a service-specific logger that sanitizes all output.
 */
export function createLogger(service: string, context: LogContext = {}) {
  function log(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return;

    const entry: LogEntry = {
      level,
      service,
      message: sanitizePII(message),
      timestamp: new Date().toISOString(),
    };

    const merged = mergeData(context, data);
    if (merged !== undefined) {
      entry.data = sanitizeObject(merged);
    }

    WRITERS[level](JSON.stringify(entry));
  }

  return {
    debug: (message: string, data?: unknown) => log('debug', message, data),
    info: (message: string, data?: unknown) => log('info', message, data),
    warn: (message: string, data?: unknown) => log('warn', message, data),
    error: (message: string, data?: unknown) => log('error', message, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;
