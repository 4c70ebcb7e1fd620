/**
 * Metric Argument Validation
 *
 * Zod schemas for the arguments every metric shares, plus assert helpers
 * that turn schema failures into InvalidArgumentError.
 */

import { z } from 'zod';
import { InvalidArgumentError } from '../errors/index.js';
import type { RankedQuery } from './types.js';

/**
 * Cutoff k: a finite integer, at least 1.
 */
export const CutoffSchema = z
  .number({ invalid_type_error: 'k must be a number' })
  .int('k must be an integer')
  .min(1, 'k must be at least 1');

/**
 * Validate a cutoff.
 *
 * @throws InvalidArgumentError when k is not an integer >= 1
 */
export function assertCutoff(k: number): void {
  const result = CutoffSchema.safeParse(k);
  if (!result.success) {
    throw new InvalidArgumentError(
      `Invalid cutoff k=${String(k)}`,
      result.error.issues.map((issue) => issue.message)
    );
  }
}

/**
 * Validate a multi-query collection. The mean of zero values is undefined.
 *
 * @throws InvalidArgumentError when queries is empty
 */
export function assertQueries<T>(
  queries: readonly RankedQuery<T>[],
  metric: string
): void {
  if (queries.length === 0) {
    throw new InvalidArgumentError(`Cannot compute ${metric} over zero queries`, [
      'queries must contain at least one query',
    ]);
  }
}
