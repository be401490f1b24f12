/**
 * Observability Module
 *
 * Logger and Metrics interfaces shared by every module, plus the default
 * implementations: a JSON-lines console logger filtered by level and a
 * no-op metrics collector.
 */

/**
 * Logger interface for observability
 */
export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Metrics interface for observability
 */
export interface Metrics {
  increment(metric: string, tags?: Record<string, string>): void;
  gauge(metric: string, value: number, tags?: Record<string, string>): void;
  timing(metric: string, value: number, tags?: Record<string, string>): void;
}

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Create a console logger that writes one JSON object per line
 *
 * @param module - Module name stamped on every entry
 * @param level - Minimum level to emit (default: info)
 */
export function createConsoleLogger(module: string, level: LogLevel = 'info'): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    const line = JSON.stringify({
      level: entryLevel,
      module,
      message,
      ...context,
      timestamp: new Date().toISOString(),
    });
    switch (entryLevel) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'debug':
        console.debug(line);
        break;
      default:
        console.log(line);
    }
  };

  return {
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    debug: (message, context) => write('debug', message, context),
  };
}

/**
 * Default console logger implementation
 */
export const defaultLogger: Logger = createConsoleLogger('pipeline');

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => { /* no-op */ },
  gauge: () => { /* no-op */ },
  timing: () => { /* no-op */ },
};

/**
 * Serialize an unknown error for a log context, keeping the stack
 */
export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}
