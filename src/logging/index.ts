/**
 * Structured JSON logging
 */

export {
  Logger,
  LOG_LEVELS,
  DEFAULT_LOGGER_CONFIG,
  type LogLevel,
  type EntryLevel,
  type LoggerConfig,
  type LogEntry,
  type LogContext,
} from './logger.js';
