/**
 * Structured Logger
 *
 * JSON-formatted logging with levels: debug, info, warn, error
 *
 * - Debug logs only emit when LOG_LEVEL=debug or NODE_ENV !== 'production'
 * - All output is JSON for machine parsing in production
 * - createLogger(component) stamps the emitting component on every entry
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

function formatEntry(level: LogLevel, message: string, context?: LogContext) {
  const entry: LogContext = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (context) {
    Object.assign(entry, context);
  }
  return JSON.stringify(entry);
}

function emit(level: LogLevel, message: string, context?: LogContext): void {
  if (!shouldLog(level)) return;
  const line = formatEntry(level, message, context);
  switch (level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line);
      break;
  }
}

export const logger: Logger = {
  debug(message, context) {
    emit('debug', message, context);
  },
  info(message, context) {
    emit('info', message, context);
  },
  warn(message, context) {
    emit('warn', message, context);
  },
  error(message, context) {
    emit('error', message, context);
  },
};

/**
 * Logger bound to a component name, e.g. createLogger('provider-router').
 * Explicit context keys win over the bound component.
 */
export function createLogger(component: string): Logger {
  const bind = (context?: LogContext): LogContext => ({ component, ...context });
  return {
    debug: (message, context) => emit('debug', message, bind(context)),
    info: (message, context) => emit('info', message, bind(context)),
    warn: (message, context) => emit('warn', message, bind(context)),
    error: (message, context) => emit('error', message, bind(context)),
  };
}
