/**
 * Error type definitions for rank-metrics
 *
 * These custom error classes provide:
 * - Stable string codes for programmatic error handling
 * - Recovery hints for the caller
 * - Type safety for error handling logic
 */

import type { MetricName } from '../metrics/types.js';

/**
 * Error codes carried by every MetricError.
 */
export const MetricErrorCodes = {
  /** A cutoff or query collection failed validation */
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  /** A metric denominator would be zero for this query */
  DEGENERATE_QUERY: 'DEGENERATE_QUERY',
  /** Evaluation config failed schema validation */
  CONFIG_INVALID: 'CONFIG_INVALID',
} as const;

export type MetricErrorCode = (typeof MetricErrorCodes)[keyof typeof MetricErrorCodes];

/**
 * Base class for all errors thrown by the library.
 *
 * hint tells the caller HOW to fix the input; code lets callers branch
 * without matching on message text.
 */
export class MetricError extends Error {
  /** Recovery suggestion for the caller */
  public readonly hint?: string;

  public readonly code: MetricErrorCode;

  constructor(code: MetricErrorCode, message: string, hint?: string) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'MetricError';
    this.code = code;
    this.hint = hint;
  }
}

/**
 * Thrown when an argument fails validation.
 *
 * Examples:
 * - k is zero, negative or not an integer
 * - an empty query collection passed to a mean metric
 */
export class InvalidArgumentError extends MetricError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(
    message: string,
    issues: string[] = [],
    code: MetricErrorCode = MetricErrorCodes.INVALID_ARGUMENT,
    hint = 'Check the arguments and try again'
  ) {
    super(code, message, hint);
    this.name = 'InvalidArgumentError';
    this.issues = issues;
  }
}

/**
 * Thrown when a single-query metric would divide by zero.
 *
 * recall and averagePrecision divide by |actual|, precision by the size of
 * the top-k window. An empty denominator means the caller supplied a query
 * the metric cannot score, so this is an InvalidArgumentError with its own
 * code.
 */
export class DegenerateQueryError extends InvalidArgumentError {
  /** Metric that rejected the query */
  public readonly metric: MetricName;

  constructor(metric: MetricName, reason: string) {
    super(
      `Cannot compute ${metric}: ${reason}`,
      [],
      MetricErrorCodes.DEGENERATE_QUERY,
      'Drop queries without relevant or predicted items before scoring'
    );
    this.name = 'DegenerateQueryError';
    this.metric = metric;
  }
}

/**
 * Thrown for configuration errors.
 */
export class ConfigError extends MetricError {
  constructor(message: string, hint?: string) {
    super(
      MetricErrorCodes.CONFIG_INVALID,
      message,
      hint ?? 'Pass only the keys defined by EvaluationConfigSchema'
    );
    this.name = 'ConfigError';
  }
}
