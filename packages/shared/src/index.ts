/**
 * Fault Proxy - Shared Package
 * Types, validation, errors, logging, and utilities
 * @module @fault-proxy/shared
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
  isTestEnvironment,
  logger,
  generateCorrelationId,
  type LogLevel,
  type LogMeta,
  type LogEntry,
  type LoggerConfig,
} from './logging/logger.js';

// Utilities
export {
  isPlainObject,
  isPromiseLike,
  sleep,
} from './utils/index.js';
