type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.PAGECITE_LOG_LEVEL?.trim().toLowerCase() ?? '';
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

const emit = (level: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
  // stdout carries citations and --json output; logs always go to stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
