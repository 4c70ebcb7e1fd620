/**
 * Evaluation Report Types
 *
 * Shapes produced by the evaluator and consumed by the aggregator and
 * report renderers. All metric values are in [0, 1] where higher is better.
 */

// ============================================================================
// METRICS TYPES
// ============================================================================

/**
 * Every single-query metric for one ranked query at one k.
 */
export interface QueryMetrics {
  recall: number;
  precision: number;
  f1: number;
  average_precision: number;
  reciprocal_rank: number;
  ndcg: number;
  hit_rate: number;
}

/**
 * Macro-averaged metrics across all queries of a run.
 */
export interface AggregateMetrics {
  /**
   * Mean Average Precision (MAP).
   *
   * Combines precision and recall into a single rank-aware score.
   */
  map: number;

  /**
   * Mean Reciprocal Rank (MRR).
   *
   * MRR=1.0 means every query's first result was relevant.
   */
  mrr: number;

  /**
   * Normalized Discounted Cumulative Gain (nDCG).
   *
   * Rewards having the relevant results at the TOP.
   */
  ndcg: number;

  /** Mean precision at k */
  precision: number;

  /** Mean recall at k */
  recall: number;

  /** Mean F1 at k */
  f1: number;

  /** Fraction of queries with at least one relevant result in top-k */
  hit_rate: number;
}

export type AggregateMetricName = keyof AggregateMetrics;

/**
 * Result of evaluating a batch of ranked queries.
 */
export interface MetricsReport {
  /** Cutoff every metric was computed at */
  k: number;
  /** Number of queries evaluated */
  queryCount: number;
  /** Per-query metrics, in input order */
  perQuery: QueryMetrics[];
  /** Macro-averaged metrics */
  aggregate: AggregateMetrics;
}

// ============================================================================
// COMPARISON TYPES
// ============================================================================

/**
 * Direction of metric change between two reports.
 *
 * - 'up': improved by more than the threshold
 * - 'down': regressed by more than the threshold
 * - 'stable': change within ±threshold
 */
export type MetricDirection = 'up' | 'down' | 'stable';

export interface MetricChange {
  current: number;
  previous: number;
  /** current - previous */
  delta: number;
  direction: MetricDirection;
  isRegression: boolean;
  isImprovement: boolean;
}

/**
 * Metric-by-metric comparison of two reports.
 */
export interface ReportComparison {
  /** Shared cutoff of both reports */
  k: number;
  /** Absolute change a metric had to exceed to be flagged */
  threshold: number;
  metrics: Record<AggregateMetricName, MetricChange>;
  summary: {
    regressionCount: number;
    improvementCount: number;
    stableCount: number;
  };
}

/**
 * An aggregate metric that fell below its configured minimum.
 */
export interface ThresholdFailure {
  metric: AggregateMetricName;
  actual: number;
  minimum: number;
}
