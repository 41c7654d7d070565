/**
 * Logging utilities.
 *
 * Provides consistent log formatting with context-based prefixes and debug mode support.
 */

export {
  createLogger,
  enableDebugLogging,
  isDebugEnabled,
  type Logger,
} from './logger.js';
