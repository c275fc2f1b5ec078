/**
 * Logging Module
 *
 * Provides:
 * - Console logger with optional prefix
 * - In-memory recording logger
 */

export {
  createConsoleLogger,
  createRecordingLogger,
  type Logger,
  type ConsoleLoggerOptions,
  type RecordingLogger,
} from './logger.js';
