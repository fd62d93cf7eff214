/**
 * @fileoverview Logging exports
 */

export {
  TickitLogger,
  getLogger,
  configureLogger,
  createLogger,
  resetLogger,
  isLogLevel,
  LOG_LEVELS,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';
