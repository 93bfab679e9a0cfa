/**
 * Structured logging utility.
 *
 * Outputs one JSON object per line so that log aggregators can parse entries.
 * The minimum level comes from LOG_LEVEL (debug | info | warn | error, default info);
 * debug output is never written in production.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  level: LogLevel;
  context: string;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

function shouldLog(level: LogLevel): boolean {
  if (level === 'debug' && process.env.NODE_ENV === 'production') {
    return false;
  }
  const configured = process.env.LOG_LEVEL?.toLowerCase();
  const minimum = isLogLevel(configured) ? configured : 'info';
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minimum];
}

export function formatLog(level: LogLevel, context: string, message: string, extra?: Record<string, unknown>): string {
  const entry: LogEntry = {
    level,
    context,
    message,
    timestamp: new Date().toISOString(),
    ...extra,
  };
  return JSON.stringify(entry);
}

/**
 * Log an error message with context
 */
export function logError(context: string, error: unknown, extra?: Record<string, unknown>): void {
  if (!shouldLog('error')) return;
  const message = error instanceof Error ? error.message : String(error);
  console.error(formatLog('error', context, message, extra));
}

/**
 * Log a warning message with context
 */
export function logWarn(context: string, message: string, extra?: Record<string, unknown>): void {
  if (!shouldLog('warn')) return;
  console.warn(formatLog('warn', context, message, extra));
}

export function logInfo(context: string, message: string, extra?: Record<string, unknown>): void {
  if (!shouldLog('info')) return;
  console.log(formatLog('info', context, message, extra));
}

export function logDebug(context: string, message: string, extra?: Record<string, unknown>): void {
  if (!shouldLog('debug')) return;
  console.log(formatLog('debug', context, message, extra));
}
