/**
 * Evaluation Aggregator
 *
 * Compares two reports to surface quality changes, and checks a report
 * against configured minimums.
 *
 * - compareReports(current, previous) — deltas, regressions and improvements
 * - checkThresholds(aggregate, thresholds) — metrics below their minimum
 */

import { DEFAULT_CONFIG, EvaluationConfigSchema, type Thresholds } from '../config/index.js';
import { InvalidArgumentError } from '../errors/index.js';
import type {
  AggregateMetricName,
  AggregateMetrics,
  MetricChange,
  MetricDirection,
  MetricsReport,
  ReportComparison,
  ThresholdFailure,
} from './types.js';

/**
 * Ordered list of all aggregate metric keys.
 *
 * Used for iteration — avoids `Object.keys()` which loses type information.
 */
export const AGGREGATE_METRIC_NAMES: readonly AggregateMetricName[] = [
  'map',
  'mrr',
  'ndcg',
  'precision',
  'recall',
  'f1',
  'hit_rate',
] as const;

/**
 * Slack for rounding error in a subtraction of two scores. 0.8 - 0.75 is
 * 0.05000000000000004 in floating point.
 */
const DELTA_TOLERANCE = 1e-9;

/**
 * Strict inequality: a delta of exactly ±threshold is stable.
 */
function classifyDelta(
  delta: number,
  threshold: number
): { direction: MetricDirection; isRegression: boolean; isImprovement: boolean } {
  if (delta > threshold + DELTA_TOLERANCE) {
    return { direction: 'up', isRegression: false, isImprovement: true };
  }
  if (delta < -threshold - DELTA_TOLERANCE) {
    return { direction: 'down', isRegression: true, isImprovement: false };
  }
  return { direction: 'stable', isRegression: false, isImprovement: false };
}

/**
 * Compare two reports metric by metric.
 *
 * Both reports must have been computed at the same k; scores at different
 * cutoffs are not comparable.
 *
 * @param threshold - Absolute change to exceed (default: DEFAULT_CONFIG.regression_threshold)
 * @throws InvalidArgumentError when k differs or threshold is outside [0, 1]
 *
 * @example
 * const comparison = compareReports(todayReport, yesterdayReport);
 * if (comparison.summary.regressionCount > 0) logger.warn('Ranking quality dropped');
 */
export function compareReports(
  current: MetricsReport,
  previous: MetricsReport,
  threshold: number = DEFAULT_CONFIG.regression_threshold
): ReportComparison {
  if (current.k !== previous.k) {
    throw new InvalidArgumentError('Cannot compare reports computed at different cutoffs', [
      `current k=${current.k}, previous k=${previous.k}`,
    ]);
  }

  const parsedThreshold = EvaluationConfigSchema.shape.regression_threshold.safeParse(threshold);
  if (!parsedThreshold.success) {
    throw new InvalidArgumentError(
      `Invalid regression threshold ${String(threshold)}`,
      parsedThreshold.error.issues.map((issue) => issue.message)
    );
  }

  const change = (name: AggregateMetricName): MetricChange => {
    const delta = current.aggregate[name] - previous.aggregate[name];
    return {
      current: current.aggregate[name],
      previous: previous.aggregate[name],
      delta,
      ...classifyDelta(delta, threshold),
    };
  };

  const metrics: ReportComparison['metrics'] = {
    map: change('map'),
    mrr: change('mrr'),
    ndcg: change('ndcg'),
    precision: change('precision'),
    recall: change('recall'),
    f1: change('f1'),
    hit_rate: change('hit_rate'),
  };

  const changes = AGGREGATE_METRIC_NAMES.map((name) => metrics[name]);
  const regressionCount = changes.filter((c) => c.isRegression).length;
  const improvementCount = changes.filter((c) => c.isImprovement).length;

  return {
    k: current.k,
    threshold,
    metrics,
    summary: {
      regressionCount,
      improvementCount,
      stableCount: changes.length - regressionCount - improvementCount,
    },
  };
}

/**
 * List the aggregate metrics that fall below their configured minimum.
 * Metrics without a minimum are not checked; a value equal to the minimum passes.
 */
export function checkThresholds(
  aggregate: AggregateMetrics,
  thresholds: Thresholds
): ThresholdFailure[] {
  const failures: ThresholdFailure[] = [];

  for (const metric of AGGREGATE_METRIC_NAMES) {
    const minimum = thresholds[metric];
    if (minimum !== undefined && aggregate[metric] < minimum) {
      failures.push({ metric, actual: aggregate[metric], minimum });
    }
  }

  return failures;
}
