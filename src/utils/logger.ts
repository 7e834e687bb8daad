/**
 * Logging Utility
 *
 * Console logging with a component/action prefix, a process-wide minimum
 * level, and per-logger "once" warnings. Each ClimbSession creates its own
 * logger, so warnOnce keys are scoped to a session.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLevel;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

export interface LogContext {
  component?: string;
  action?: string;
  [key: string]: unknown;
}

/**
 * Format a log message with context prefix.
 */
function formatMessage(context: LogContext, message: string): string {
  const parts: string[] = [];

  if (context.component) {
    parts.push(`[${context.component}]`);
  }
  if (context.action) {
    parts.push(`(${context.action})`);
  }

  const prefix = parts.length > 0 ? `${parts.join(' ')} ` : '';
  return `${prefix}${message}`;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  /**
   * Warn only the first time `key` is seen by this logger.
   * Returns true when the warning was emitted.
   */
  warnOnce(key: string, message: string, context?: LogContext): boolean;
  error(message: string, error?: unknown, context?: LogContext): void;
}

/**
 * Create a logger instance with optional default context.
 *
 * @example
 * const log = createLogger({ component: 'LandmarkBuffer' });
 * log.warn('Frame out of order', { action: 'append' });
 * // Output: [LandmarkBuffer] (append) Frame out of order
 */
export function createLogger(defaultContext: LogContext = {}): Logger {
  const seen = new Set<string>();

  const logger: Logger = {
    debug(message, context = {}) {
      if (!enabled('debug')) return;
      console.debug(formatMessage({ ...defaultContext, ...context }, message));
    },

    info(message, context = {}) {
      if (!enabled('info')) return;
      console.info(formatMessage({ ...defaultContext, ...context }, message));
    },

    warn(message, context = {}) {
      if (!enabled('warn')) return;
      console.warn(formatMessage({ ...defaultContext, ...context }, message));
    },

    warnOnce(key, message, context = {}) {
      if (seen.has(key)) return false;
      seen.add(key);
      logger.warn(message, context);
      return true;
    },

    error(message, error, context = {}) {
      if (!enabled('error')) return;
      const formattedMessage = formatMessage({ ...defaultContext, ...context }, message);

      if (error) {
        console.error(formattedMessage, error);
      } else {
        console.error(formattedMessage);
      }
    },
  };

  return logger;
}

/**
 * Default logger instance for quick logging without context.
 */
export const log = createLogger();
