/**
 * Evaluation Module
 *
 * Batch evaluation, report comparison and text rendering on top of the
 * pure metric functions.
 */

export { evaluateQuery, evaluateQueries, type EvaluateOptions } from './evaluator.js';
export { compareReports, checkThresholds, AGGREGATE_METRIC_NAMES } from './aggregator.js';
export { formatReport, formatComparison, formatMetricName } from './report.js';
export type {
  QueryMetrics,
  AggregateMetrics,
  AggregateMetricName,
  MetricsReport,
  MetricDirection,
  MetricChange,
  ReportComparison,
  ThresholdFailure,
} from './types.js';
