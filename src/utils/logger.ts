import { config } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

export function normalizeLogLevel(value: string | undefined): LogLevel {
  const lowered = (value || '').toLowerCase();
  return isLogLevel(lowered) ? lowered : 'info';
}

/**
 * Console logger scoped to a component, e.g. `[enrichment] Task enriched`.
 * Context objects are passed through untouched so they print as objects.
 */
export function createLogger(scope: string, level: LogLevel = normalizeLogLevel(config.logLevel)): Logger {
  const threshold = LEVEL_PRIORITY[level];

  const write = (target: LogLevel, message: string, context?: LogContext) => {
    if (LEVEL_PRIORITY[target] < threshold) return;
    const line = `[${scope}] ${message}`;
    const sink = target === 'error' ? console.error : target === 'warn' ? console.warn : console.log;
    if (context) {
      sink(line, context);
    } else {
      sink(line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
