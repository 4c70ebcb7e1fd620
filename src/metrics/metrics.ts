/**
 * Ranking Quality Metrics
 *
 * Standard Information Retrieval metrics over binary relevance. Every
 * function is pure and synchronous: it validates k, scores the top-k window
 * of the ranking and returns a number in [0, 1].
 *
 * Metrics:
 * - Set-based: recall, precision, f1, hitRate
 * - Rank-based: averagePrecision, reciprocalRank, ndcg
 * - Multi-query: meanAveragePrecision, meanReciprocalRank
 *
 * The top-k window is the first min(k, predicted.length) items; a ranking
 * shorter than k is scored as-is, never padded.
 *
 * Duplicates in `predicted` are kept: rank-based metrics score each
 * occurrence at its own rank. Set-based counts (and the running hit count
 * of averagePrecision) count distinct relevant items.
 */

import { DegenerateQueryError } from '../errors/index.js';
import type { MetricName, RankedList, RankedQuery, RelevanceSet } from './types.js';
import { assertCutoff, assertQueries } from './validation.js';

// ============================================================================
// INTERNAL HELPERS
// ============================================================================

function toRelevanceSet<T>(actual: RelevanceSet<T>): ReadonlySet<T> {
  return actual instanceof Set ? actual : new Set<T>(actual);
}

function topK<T>(predicted: RankedList<T>, k: number): RankedList<T> {
  return predicted.slice(0, k);
}

/**
 * Number of distinct relevant items in a window.
 */
function countRelevant<T>(window: RankedList<T>, relevant: ReadonlySet<T>): number {
  const found = new Set<T>();
  for (const item of window) {
    if (relevant.has(item)) found.add(item);
  }
  return found.size;
}

/**
 * Discount for a 0-based index: rank r = index + 1 is discounted by log2(r + 1).
 */
function discount(index: number): number {
  return 1 / Math.log2(index + 2);
}

// ============================================================================
// SET-BASED METRICS
// ============================================================================

/**
 * Recall@k: fraction of relevant items found in the top-k predictions.
 *
 * Formula: |distinct(top-k) ∩ actual| / |actual|
 *
 * @throws InvalidArgumentError when k < 1
 * @throws DegenerateQueryError when `actual` is empty
 *
 * @example
 * recall([1, 2, 3, 4], [4, 2, 6, 1, 7], 3) // => 0.5
 */
export function recall<T>(actual: RelevanceSet<T>, predicted: RankedList<T>, k: number): number {
  assertCutoff(k);

  const relevant = toRelevanceSet(actual);
  if (relevant.size === 0) {
    throw new DegenerateQueryError('recall', 'relevance set is empty');
  }

  return countRelevant(topK(predicted, k), relevant) / relevant.size;
}

/**
 * Precision@k: fraction of the top-k predictions that are relevant.
 *
 * Formula: |distinct(top-k) ∩ actual| / min(k, |predicted|)
 *
 * An empty `actual` with a non-empty ranking scores 0.
 *
 * @throws InvalidArgumentError when k < 1
 * @throws DegenerateQueryError when `predicted` is empty
 *
 * @example
 * precision([1, 2, 3, 4], [4, 2, 6, 1, 7], 3) // => 0.667
 */
export function precision<T>(actual: RelevanceSet<T>, predicted: RankedList<T>, k: number): number {
  assertCutoff(k);

  const window = topK(predicted, k);
  if (window.length === 0) {
    throw new DegenerateQueryError('precision', 'ranked list is empty');
  }

  return countRelevant(window, toRelevanceSet(actual)) / window.length;
}

/**
 * F1@k: harmonic mean of precision@k and recall@k.
 *
 * Defined as 0 when both are 0. Degenerate queries fail as they do for
 * precision and recall.
 *
 * @example
 * f1([1, 2], [1, 3], 2) // => 0.5
 */
export function f1<T>(actual: RelevanceSet<T>, predicted: RankedList<T>, k: number): number {
  const p = precision(actual, predicted, k);
  const r = recall(actual, predicted, k);

  if (p + r === 0) return 0;
  return (2 * p * r) / (p + r);
}

/**
 * Hit Rate@k: 1 if any top-k prediction is relevant, else 0.
 */
export function hitRate<T>(actual: RelevanceSet<T>, predicted: RankedList<T>, k: number): number {
  assertCutoff(k);

  const relevant = toRelevanceSet(actual);
  return topK(predicted, k).some((item) => relevant.has(item)) ? 1 : 0;
}

// ============================================================================
// RANK-BASED METRICS
// ============================================================================

/**
 * Average Precision@k.
 *
 * At each rank r whose item is relevant, take precision at r
 * (relevant so far / r) and sum. The sum is divided by the TOTAL relevant
 * count, not by the hits found, so missing relevant items lowers the score.
 *
 * @throws InvalidArgumentError when k < 1
 * @throws DegenerateQueryError when `actual` is empty
 *
 * @example
 * averagePrecision([1, 2, 3], [1, 4, 2, 3], 3)
 * // rank 1 (1): 1/1, rank 3 (2): 2/3
 * // AP = (1 + 0.667) / 3 = 0.556
 */
export function averagePrecision<T>(
  actual: RelevanceSet<T>,
  predicted: RankedList<T>,
  k: number
): number {
  assertCutoff(k);

  const relevant = toRelevanceSet(actual);
  if (relevant.size === 0) {
    throw new DegenerateQueryError('averagePrecision', 'relevance set is empty');
  }

  const seen = new Set<T>();
  let precisionSum = 0;

  for (const [index, item] of topK(predicted, k).entries()) {
    if (relevant.has(item)) {
      seen.add(item);
      precisionSum += seen.size / (index + 1);
    }
  }

  return precisionSum / relevant.size;
}

/**
 * Reciprocal Rank@k: 1 / rank of the first relevant prediction in the
 * top-k window, or 0 when there is none. Total: an empty `actual` scores 0.
 *
 * @example
 * reciprocalRank([2], [3, 2, 1], 3) // => 0.5
 */
export function reciprocalRank<T>(
  actual: RelevanceSet<T>,
  predicted: RankedList<T>,
  k: number
): number {
  assertCutoff(k);

  const relevant = toRelevanceSet(actual);
  const firstRelevantIndex = topK(predicted, k).findIndex((item) => relevant.has(item));

  return firstRelevantIndex === -1 ? 0 : 1 / (firstRelevantIndex + 1);
}

/**
 * nDCG@k (Normalized Discounted Cumulative Gain) with binary relevance.
 *
 * DCG  = Σ rel(r) / log2(r + 1) for r = 1..min(k, |predicted|)
 * IDCG = Σ 1 / log2(r + 1)      for r = 1..min(k, |actual|)
 * nDCG = DCG / IDCG, or 0 when IDCG is 0 (no relevant items).
 *
 * @example
 * ndcg([1, 3], [1, 2, 3], 3)
 * // DCG = 1/log2(2) + 0 + 1/log2(4) = 1.5
 * // IDCG = 1/log2(2) + 1/log2(3) = 1.631
 * // nDCG = 0.920
 */
export function ndcg<T>(actual: RelevanceSet<T>, predicted: RankedList<T>, k: number): number {
  assertCutoff(k);

  const relevant = toRelevanceSet(actual);

  let dcg = 0;
  for (const [index, item] of topK(predicted, k).entries()) {
    if (relevant.has(item)) {
      dcg += discount(index);
    }
  }

  // Ideal ranking: every relevant item first, up to k of them
  const idealCount = Math.min(relevant.size, k);
  let idcg = 0;
  for (let index = 0; index < idealCount; index++) {
    idcg += discount(index);
  }

  return idcg === 0 ? 0 : dcg / idcg;
}

// ============================================================================
// MULTI-QUERY METRICS
// ============================================================================

function meanOver<T>(
  queries: readonly RankedQuery<T>[],
  k: number,
  metric: MetricName,
  score: (query: RankedQuery<T>) => number
): number {
  assertCutoff(k);
  assertQueries(queries, metric);

  let total = 0;
  for (const query of queries) {
    total += score(query);
  }
  return total / queries.length;
}

/**
 * Mean Average Precision@k: mean of averagePrecision over the queries.
 *
 * A degenerate query fails the whole computation; no query is skipped.
 *
 * @throws InvalidArgumentError when k < 1 or `queries` is empty
 * @throws DegenerateQueryError when any query has an empty `actual`
 *
 * @example
 * meanAveragePrecision(
 *   [{ actual: [1], predicted: [1, 2, 3] }, { actual: [2], predicted: [3, 2, 1] }],
 *   3,
 * ) // => 0.75
 */
export function meanAveragePrecision<T>(queries: readonly RankedQuery<T>[], k: number): number {
  return meanOver(queries, k, 'meanAveragePrecision', ({ actual, predicted }) =>
    averagePrecision(actual, predicted, k)
  );
}

/**
 * Mean Reciprocal Rank@k: mean of reciprocalRank over the queries.
 *
 * @throws InvalidArgumentError when k < 1 or `queries` is empty
 */
export function meanReciprocalRank<T>(queries: readonly RankedQuery<T>[], k: number): number {
  return meanOver(queries, k, 'meanReciprocalRank', ({ actual, predicted }) =>
    reciprocalRank(actual, predicted, k)
  );
}
