/**
 * Error formatting for display
 *
 * This module provides:
 * - Colored error output for terminals
 * - JSON output for programmatic use
 * - Verbose mode with stack traces
 *
 * The library itself never prints; callers that surface errors to a
 * person or a log pipeline format them here.
 */

import chalk from 'chalk';
import type { MetricName } from '../metrics/types.js';
import { DegenerateQueryError, InvalidArgumentError, MetricError } from './types.js';

/**
 * Options for error formatting
 */
export interface ErrorFormatOptions {
  /** Include stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: string;
  /** Metric that rejected a degenerate query */
  metric?: MetricName;
  /** Validation issues of an InvalidArgumentError */
  issues?: string[];
  hint?: string;
  stack?: string;
}

/** Code reported for anything that is not a MetricError */
export const UNKNOWN_ERROR_CODE = 'UNKNOWN';

/**
 * Get the code for an error.
 *
 * MetricError has a specific code, everything else is UNKNOWN.
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof MetricError) {
    return error.code;
  }
  return UNKNOWN_ERROR_CODE;
}

function toErrorOutput(error: unknown, verbose: boolean): ErrorOutput {
  if (!(error instanceof Error)) {
    return { error: String(error), code: UNKNOWN_ERROR_CODE };
  }

  const output: ErrorOutput = {
    error: error.message,
    code: getErrorCode(error),
    stack: verbose ? error.stack : undefined,
  };

  if (error instanceof DegenerateQueryError) {
    output.metric = error.metric;
  } else if (error instanceof InvalidArgumentError && error.issues.length > 0) {
    output.issues = [...error.issues];
  }

  if (error instanceof MetricError) {
    output.hint = error.hint;
  }

  return output;
}

/**
 * Format an error for display.
 *
 * Text mode prints the message, then the rejecting metric or the
 * validation issues, then the hint:
 *
 * ```
 * Error: Invalid cutoff k=0
 *   - k must be at least 1
 * Hint: Check the arguments and try again
 * ```
 */
export function formatError(error: unknown, options: ErrorFormatOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];

  if (output.metric) {
    lines.push(chalk.dim('Metric: ') + output.metric);
  }
  for (const issue of output.issues ?? []) {
    lines.push(`  - ${issue}`);
  }
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}
