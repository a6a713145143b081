/**
 * capbench - Shared Package
 * Types, validation, errors, logging, and utilities
 * @module @capbench/shared
 */

// Types
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Validation
export * from './validation/index.js';

// Logging
export {
  Logger,
  createLogger,
  createServiceLogger,
  isLogLevel,
  generateCorrelationId,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';

// Utilities
export {
  generateUUID,
  isPlainObject,
  parseList,
  sleep,
  round,
  mean,
  percentile,
  formatReportTimestamp,
} from './utils/index.js';
