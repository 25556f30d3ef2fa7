/**
 * Logger
 *
 * Leveled logging on top of the console. Breaker transitions, retries and
 * persistence problems are reported through this interface so callers can
 * route them elsewhere.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Numeric rank of each level; a message is written when its rank is at
 * least the logger's rank.
 */
export const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

/**
 * Subset of the console used as output
 */
export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

/**
 * Create a logger that writes to the console (or another sink) and drops
 * messages below `level`.
 */
export function createConsoleLogger(
  level: LogLevel = 'info',
  sink: LogSink = console,
  prefix = '[resilience]'
): Logger {
  const threshold = LOG_LEVEL_RANK[level];

  const write = (messageLevel: Exclude<LogLevel, 'silent'>) =>
    (message: string, fields?: LogFields): void => {
      if (LOG_LEVEL_RANK[messageLevel] < threshold) {
        return;
      }
      if (fields && Object.keys(fields).length > 0) {
        sink[messageLevel](`${prefix} ${message}`, fields);
      } else {
        sink[messageLevel](`${prefix} ${message}`);
      }
    };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = createConsoleLogger('silent');

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_LEVEL_RANK, value);
}
