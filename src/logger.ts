/**
 * Console logger with bracketed component prefixes.
 *
 * Output format matches the rest of the codebase:
 *   console.log('[loader] Parsed checklist:', { columnCount: 2, categories: 4 })
 *
 * The level threshold is set once at startup from LOG_LEVEL.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

const SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.log(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createLogger(component: string): Logger {
  const write = (level: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const line = `[${component}] ${message}`;
    if (context) {
      SINKS[level](line, context);
    } else {
      SINKS[level](line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
