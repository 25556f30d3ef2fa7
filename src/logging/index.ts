/**
 * Logging Module
 */

export {
  createConsoleLogger,
  isLogLevel,
  silentLogger,
  LOG_LEVELS,
  LOG_LEVEL_RANK,
  type LogFields,
  type LogLevel,
  type LogSink,
  type Logger,
} from './logger';
