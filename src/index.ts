/**
 * rank-metrics - Library Entry Point
 *
 * Ranking-quality metrics for information retrieval: Recall, Precision, F1,
 * Average Precision, MAP, Reciprocal Rank, MRR, nDCG and Hit Rate, plus a
 * batch evaluator and report comparison on top of them.
 *
 * @example Single-query metrics
 * ```typescript
 * import { recall, ndcg } from 'rank-metrics';
 *
 * recall([1, 2, 3, 4], [4, 2, 6, 1, 7], 3); // => 0.5
 * ndcg([1, 2, 3], [3, 1, 2], 3);             // => 1
 * ```
 *
 * @example Batch evaluation
 * ```typescript
 * import { evaluateQueries, formatReport } from 'rank-metrics';
 *
 * const report = evaluateQueries(
 *   [{ actual: [1], predicted: [1, 2, 3] }, { actual: [2], predicted: [3, 2, 1] }],
 *   { config: { k: 3 } },
 * );
 * console.log(formatReport(report));
 * ```
 *
 * @packageDocumentation
 */

// Metric functions and input types
export {
  recall,
  precision,
  f1,
  hitRate,
  averagePrecision,
  reciprocalRank,
  ndcg,
  meanAveragePrecision,
  meanReciprocalRank,
  CutoffSchema,
} from './metrics/index.js';

export type { RelevanceSet, RankedList, RankedQuery, MetricName } from './metrics/index.js';

// Batch evaluation and reports
export {
  evaluateQuery,
  evaluateQueries,
  compareReports,
  checkThresholds,
  formatReport,
  formatComparison,
  AGGREGATE_METRIC_NAMES,
} from './eval/index.js';

export type {
  EvaluateOptions,
  QueryMetrics,
  AggregateMetrics,
  AggregateMetricName,
  MetricsReport,
  MetricDirection,
  MetricChange,
  ReportComparison,
  ThresholdFailure,
} from './eval/index.js';

// Configuration
export {
  EvaluationConfigSchema,
  PartialEvaluationConfigSchema,
  DEFAULT_CONFIG,
  resolveConfig,
} from './config/index.js';

export type { EvaluationConfig, PartialEvaluationConfig, Thresholds } from './config/index.js';

// Errors
export {
  MetricError,
  MetricErrorCodes,
  InvalidArgumentError,
  DegenerateQueryError,
  ConfigError,
  formatError,
  getErrorCode,
} from './errors/index.js';

export type { MetricErrorCode, ErrorFormatOptions, ErrorOutput } from './errors/index.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
