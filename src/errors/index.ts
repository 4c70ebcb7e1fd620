/**
 * Error handling module
 *
 * Usage:
 *   import { InvalidArgumentError, formatError } from './errors/index.js';
 *
 *   throw new InvalidArgumentError('k must be at least 1', ['k: 0']);
 */

// Error types
export {
  MetricError,
  MetricErrorCodes,
  InvalidArgumentError,
  DegenerateQueryError,
  ConfigError,
  type MetricErrorCode,
} from './types.js';

// Formatting utilities
export {
  formatError,
  getErrorCode,
  UNKNOWN_ERROR_CODE,
  type ErrorFormatOptions,
  type ErrorOutput,
} from './handler.js';
