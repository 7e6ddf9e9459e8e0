/**
 * @fileoverview Logging exports
 */

export {
  WayfarerLogger,
  LOG_LEVELS,
  isLogLevel,
  getLogger,
  configureLogger,
  createLogger,
  resetLogger,
  type LogLevel,
  type LoggerOptions,
  type LogContext,
} from './logger.js';

export {
  withLoggingContext,
  getLoggingContext,
  updateLoggingContext,
  type LoggingContext,
} from './log-context.js';

export {
  LogErrorCategory,
  LogErrorCodes,
  categorizeError,
  type StructuredError,
  type LogErrorCode,
} from './error-codes.js';
