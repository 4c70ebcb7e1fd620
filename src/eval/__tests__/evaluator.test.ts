/**
 * Batch Evaluator Tests
 *
 * Pure unit tests over in-memory rankings. Expected values are computed
 * by hand; see the per-query breakdown on QUERIES.
 */

import { describe, it, expect, vi } from 'vitest';
import { evaluateQuery, evaluateQueries } from '../evaluator.js';
import {
  ConfigError,
  DegenerateQueryError,
  InvalidArgumentError,
} from '../../errors/index.js';
import { meanAveragePrecision, meanReciprocalRank } from '../../metrics/index.js';
import type { Logger } from '../../utils/logger.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

// Query 1: hit at rank 1 => AP 1, RR 1, nDCG 1
// Query 2: hit at rank 2 => AP 0.5, RR 0.5, nDCG 1/log2(3)
// Both: recall 1, precision 1/3, F1 0.5, hit rate 1
const QUERIES = [
  { actual: [1], predicted: [1, 2, 3] },
  { actual: [2], predicted: [3, 2, 1] },
];

function makeLogger() {
  return { warn: vi.fn(), debug: vi.fn() } satisfies Logger;
}

// ============================================================================
// evaluateQuery
// ============================================================================

describe('evaluateQuery', () => {
  it('computes every single-query metric', () => {
    const metrics = evaluateQuery(QUERIES[1]!, 3);

    expect(metrics.recall).toBe(1);
    expect(metrics.precision).toBeCloseTo(1 / 3, 10);
    expect(metrics.f1).toBeCloseTo(0.5, 10);
    expect(metrics.average_precision).toBe(0.5);
    expect(metrics.reciprocal_rank).toBe(0.5);
    expect(metrics.ndcg).toBeCloseTo(1 / Math.log2(3), 10);
    expect(metrics.hit_rate).toBe(1);
  });

  it('propagates degenerate queries', () => {
    expect(() => evaluateQuery({ actual: [], predicted: [1] }, 1)).toThrow(DegenerateQueryError);
  });
});

// ============================================================================
// evaluateQueries
// ============================================================================

describe('evaluateQueries', () => {
  it('macro-averages metrics across queries', () => {
    const report = evaluateQueries(QUERIES, { config: { k: 3 } });

    expect(report.k).toBe(3);
    expect(report.queryCount).toBe(2);
    expect(report.perQuery).toHaveLength(2);
    expect(report.aggregate.map).toBe(0.75);
    expect(report.aggregate.mrr).toBe(0.75);
    expect(report.aggregate.ndcg).toBeCloseTo((1 + 1 / Math.log2(3)) / 2, 10);
    expect(report.aggregate.precision).toBeCloseTo(1 / 3, 10);
    expect(report.aggregate.recall).toBe(1);
    expect(report.aggregate.f1).toBeCloseTo(0.5, 10);
    expect(report.aggregate.hit_rate).toBe(1);
  });

  it('agrees with meanAveragePrecision and meanReciprocalRank', () => {
    // AP: (1 + 2/3) / 2, 0, 1/3 => MAP 7/18; RR: 1, 0, 1 => MRR 2/3
    const queries = [
      { actual: [1, 2], predicted: [2, 5, 1] },
      { actual: [3], predicted: [4, 5, 6] },
      { actual: [7, 8, 9], predicted: [9] },
    ];

    const report = evaluateQueries(queries, { config: { k: 3 } });

    expect(report.aggregate.map).toBe(meanAveragePrecision(queries, 3));
    expect(report.aggregate.map).toBeCloseTo(7 / 18, 10);
    expect(report.aggregate.mrr).toBe(meanReciprocalRank(queries, 3));
    expect(report.aggregate.mrr).toBeCloseTo(2 / 3, 10);
  });

  it('keeps per-query results in input order', () => {
    const report = evaluateQueries(QUERIES, { config: { k: 3 } });

    expect(report.perQuery.map((m) => m.reciprocal_rank)).toEqual([1, 0.5]);
  });

  it('defaults k to 10', () => {
    const report = evaluateQueries(QUERIES);

    expect(report.k).toBe(10);
  });

  it('applies the configured cutoff', () => {
    const report = evaluateQueries(QUERIES, { config: { k: 1 } });

    // query 2's only hit is at rank 2
    expect(report.aggregate.hit_rate).toBe(0.5);
    expect(report.aggregate.mrr).toBe(0.5);
  });

  it('logs a debug summary', () => {
    const logger = makeLogger();
    evaluateQueries(QUERIES, { config: { k: 3 }, logger });

    expect(logger.debug).toHaveBeenCalledWith('Evaluated 2 queries at k=3');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('warns about duplicate items in the top-k window', () => {
    const logger = makeLogger();
    evaluateQueries([...QUERIES, { actual: [1], predicted: [1, 1, 2] }], {
      config: { k: 3 },
      logger,
    });

    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(logger.warn).toHaveBeenCalledWith(
      'Query 2 ranks the same item more than once in its top 3; rank-based scores may exceed 1'
    );
  });

  it('ignores duplicates past the cutoff', () => {
    const logger = makeLogger();
    evaluateQueries([{ actual: [1], predicted: [1, 2, 1] }], { config: { k: 2 }, logger });

    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('throws InvalidArgumentError for zero queries', () => {
    expect(() => evaluateQueries([])).toThrow(InvalidArgumentError);
  });

  it('throws ConfigError for invalid config', () => {
    expect(() => evaluateQueries(QUERIES, { config: { k: 0 } })).toThrow(ConfigError);
  });

  it('fails the run on a degenerate query', () => {
    expect(() =>
      evaluateQueries([...QUERIES, { actual: [4], predicted: [] }], { config: { k: 3 } })
    ).toThrow(DegenerateQueryError);
  });
});
