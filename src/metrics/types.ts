/**
 * Metric Input Types
 *
 * Item identifiers are opaque: anything a Set can hold (commonly numbers
 * or strings). Equality is Set equality (SameValueZero).
 */

/**
 * Ground-truth relevant items for one query. Order is not meaningful and
 * duplicates in an array count once.
 */
export type RelevanceSet<T> = ReadonlySet<T> | readonly T[];

/**
 * Predicted items for one query, most confident first.
 * Index 0 is rank 1.
 */
export type RankedList<T> = readonly T[];

/**
 * One query's judgments and predictions, the element of every
 * multi-query metric.
 */
export interface RankedQuery<T> {
  /** Ground-truth relevant items */
  actual: RelevanceSet<T>;
  /** Predicted ranking */
  predicted: RankedList<T>;
}

/**
 * Names of the metric functions, as reported by DegenerateQueryError and
 * the empty-collection check of the mean metrics.
 */
export type MetricName =
  | 'recall'
  | 'precision'
  | 'f1'
  | 'averagePrecision'
  | 'reciprocalRank'
  | 'ndcg'
  | 'hitRate'
  | 'meanAveragePrecision'
  | 'meanReciprocalRank';
