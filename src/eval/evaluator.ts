/**
 * Batch Evaluator
 *
 * Scores a batch of ranked queries with every metric and macro-averages
 * the results into a MetricsReport.
 *
 * Degenerate queries (empty relevance set or empty ranking) fail the whole
 * run with DegenerateQueryError; nothing is skipped silently.
 */

import { resolveConfig, type PartialEvaluationConfig } from '../config/index.js';
import {
  averagePrecision,
  f1,
  hitRate,
  ndcg,
  precision,
  recall,
  reciprocalRank,
  assertQueries,
  type RankedQuery,
} from '../metrics/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { AggregateMetrics, MetricsReport, QueryMetrics } from './types.js';

/**
 * Options for a batch evaluation.
 */
export interface EvaluateOptions {
  /** Overrides merged onto DEFAULT_CONFIG (k defaults to 10) */
  config?: PartialEvaluationConfig;
  /** Receives run summaries and duplicate warnings (default: silent) */
  logger?: Logger;
}

/**
 * Compute every single-query metric for one query.
 *
 * @throws InvalidArgumentError when k < 1
 * @throws DegenerateQueryError when `actual` or `predicted` is empty
 */
export function evaluateQuery<T>({ actual, predicted }: RankedQuery<T>, k: number): QueryMetrics {
  return {
    recall: recall(actual, predicted, k),
    precision: precision(actual, predicted, k),
    f1: f1(actual, predicted, k),
    average_precision: averagePrecision(actual, predicted, k),
    reciprocal_rank: reciprocalRank(actual, predicted, k),
    ndcg: ndcg(actual, predicted, k),
    hit_rate: hitRate(actual, predicted, k),
  };
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function hasDuplicatesInWindow<T>(predicted: readonly T[], k: number): boolean {
  const window = predicted.slice(0, k);
  return new Set(window).size < window.length;
}

/**
 * Evaluate a batch of ranked queries.
 *
 * @throws ConfigError when `options.config` is invalid
 * @throws InvalidArgumentError when `queries` is empty
 * @throws DegenerateQueryError when any query is degenerate
 *
 * @example
 * const report = evaluateQueries(
 *   [{ actual: [1], predicted: [1, 2, 3] }, { actual: [2], predicted: [3, 2, 1] }],
 *   { config: { k: 3 } },
 * );
 * report.aggregate.map // => 0.75
 */
export function evaluateQueries<T>(
  queries: readonly RankedQuery<T>[],
  options: EvaluateOptions = {}
): MetricsReport {
  const { k } = resolveConfig(options.config);
  const logger = options.logger ?? silentLogger;

  assertQueries(queries, 'evaluateQueries');

  const perQuery = queries.map((query, index) => {
    if (hasDuplicatesInWindow(query.predicted, k)) {
      logger.warn(
        `Query ${index} ranks the same item more than once in its top ${k}; rank-based scores may exceed 1`
      );
    }
    return evaluateQuery(query, k);
  });

  const aggregate: AggregateMetrics = {
    map: mean(perQuery.map((m) => m.average_precision)),
    mrr: mean(perQuery.map((m) => m.reciprocal_rank)),
    ndcg: mean(perQuery.map((m) => m.ndcg)),
    precision: mean(perQuery.map((m) => m.precision)),
    recall: mean(perQuery.map((m) => m.recall)),
    f1: mean(perQuery.map((m) => m.f1)),
    hit_rate: mean(perQuery.map((m) => m.hit_rate)),
  };

  logger.debug?.(`Evaluated ${queries.length} queries at k=${k}`);

  return { k, queryCount: queries.length, perQuery, aggregate };
}
