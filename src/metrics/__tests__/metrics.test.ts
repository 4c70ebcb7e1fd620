/**
 * Ranking Quality Metrics Tests
 *
 * Covers every metric in src/metrics/metrics.ts: formulas, cutoff handling,
 * degenerate inputs and duplicate handling.
 *
 * All expected values are computed by hand from the standard IR formulas.
 */

import { describe, it, expect } from 'vitest';
import {
  recall,
  precision,
  f1,
  hitRate,
  averagePrecision,
  reciprocalRank,
  ndcg,
  meanAveragePrecision,
  meanReciprocalRank,
} from '../metrics.js';
import { DegenerateQueryError, InvalidArgumentError } from '../../errors/index.js';

// 25 relevant ids out of 0..99, and a 10-item ranking with hits at
// ranks 5 (3), 6 (4) and 8 (14)
const RELEVANT = [
  4, 79, 32, 45, 14, 46, 53, 15, 3, 54, 68, 99, 75, 82, 35, 27, 73, 20, 25, 66, 11, 58, 31, 8, 85,
];
const RANKED = [1, 2, 62, 84, 3, 4, 81, 14, 5, 67];

// ============================================================================
// recall
// ============================================================================

describe('recall', () => {
  it('returns 1 of 25 at k=5', () => {
    expect(recall(RELEVANT, RANKED, 5)).toBeCloseTo(0.04, 10);
  });

  it('returns 3 of 25 at k=10', () => {
    expect(recall(RELEVANT, RANKED, 10)).toBeCloseTo(0.12, 10);
  });

  it('only considers the top-k window', () => {
    // top-3 = [4, 2, 6]: 4 and 2 relevant out of 4
    expect(recall([1, 2, 3, 4], [4, 2, 6, 1, 7], 3)).toBe(0.5);
  });

  it('uses the whole list when k exceeds its length', () => {
    expect(recall([1, 2, 3, 4], [4, 2], 100)).toBe(0.5);
  });

  it('accepts a Set of relevant items', () => {
    expect(recall(new Set(['a.ts', 'b.ts']), ['b.ts', 'c.ts'], 2)).toBe(0.5);
  });

  it('counts duplicate relevant ids once', () => {
    expect(recall([1, 1, 2], [1], 1)).toBe(0.5);
  });

  it('counts a repeated prediction once', () => {
    expect(recall([1, 2], [1, 1, 1], 3)).toBe(0.5);
  });

  it('returns 0 for an empty ranking', () => {
    expect(recall([1], [], 5)).toBe(0);
  });

  it('throws DegenerateQueryError for empty actual', () => {
    expect(() => recall([], [1, 2], 2)).toThrow(DegenerateQueryError);
    expect(() => recall([], [1, 2], 2)).toThrow('Cannot compute recall: relevance set is empty');
  });

  it('throws InvalidArgumentError for k < 1', () => {
    expect(() => recall([1], [1], 0)).toThrow(InvalidArgumentError);
    expect(() => recall([1], [1], -3)).toThrow(InvalidArgumentError);
  });

  it('validates k before the relevance set', () => {
    expect(() => recall([], [1], 0)).toThrow(InvalidArgumentError);
  });
});

// ============================================================================
// precision
// ============================================================================

describe('precision', () => {
  it('returns 1 of 5 at k=5', () => {
    expect(precision(RELEVANT, RANKED, 5)).toBeCloseTo(0.2, 10);
  });

  it('returns 3 of 10 at k=10', () => {
    expect(precision(RELEVANT, RANKED, 10)).toBeCloseTo(0.3, 10);
  });

  it('only considers the top-k window', () => {
    expect(precision([1, 2, 3, 4], [4, 2, 6, 1, 7], 3)).toBeCloseTo(2 / 3, 10);
  });

  it('divides by the list length when k exceeds it', () => {
    // window is [1, 3], not padded to 10
    expect(precision([1, 2], [1, 3], 10)).toBe(0.5);
  });

  it('returns 0 for empty actual', () => {
    expect(precision([], [1, 2], 2)).toBe(0);
  });

  it('counts a repeated relevant prediction once', () => {
    expect(precision([1], [1, 1], 2)).toBe(0.5);
  });

  it('throws DegenerateQueryError for an empty ranking', () => {
    expect(() => precision([1, 2], [], 3)).toThrow(DegenerateQueryError);
    expect(() => precision([1, 2], [], 3)).toThrow('Cannot compute precision: ranked list is empty');
  });

  it('throws InvalidArgumentError for non-integer k', () => {
    expect(() => precision([1], [1], 1.5)).toThrow(InvalidArgumentError);
  });
});

// ============================================================================
// f1
// ============================================================================

describe('f1', () => {
  it('returns 0.5 when precision and recall are both 0.5', () => {
    expect(f1([1, 2], [1, 3], 2)).toBe(0.5);
  });

  it('combines unequal precision and recall', () => {
    // P = 2/3, R = 1/2 => 2 * (1/3) / (7/6) = 4/7
    expect(f1([1, 2, 3, 4], [4, 2, 6, 1, 7], 3)).toBeCloseTo(4 / 7, 10);
  });

  it('returns 0 when precision and recall are both 0', () => {
    expect(f1([1], [2, 3], 2)).toBe(0);
  });

  it('returns 1 for a perfect ranking', () => {
    expect(f1([1, 2], [2, 1], 2)).toBe(1);
  });

  it('propagates degenerate recall', () => {
    expect(() => f1([], [1], 1)).toThrow(DegenerateQueryError);
  });

  it('propagates degenerate precision', () => {
    expect(() => f1([1], [], 1)).toThrow(DegenerateQueryError);
  });
});

// ============================================================================
// hitRate
// ============================================================================

describe('hitRate', () => {
  it('returns 1 when a relevant item is in the top-k', () => {
    expect(hitRate([1], [2, 1], 2)).toBe(1);
  });

  it('returns 0 when the hit is past the cutoff', () => {
    expect(hitRate([1], [2, 1], 1)).toBe(0);
  });

  it('returns 0 for empty inputs', () => {
    expect(hitRate([], [1], 1)).toBe(0);
    expect(hitRate([1], [], 1)).toBe(0);
  });
});

// ============================================================================
// averagePrecision
// ============================================================================

describe('averagePrecision', () => {
  it('divides by the total relevant count', () => {
    // rank 1: 1/1, rank 3: 2/3 => (1 + 2/3) / 3
    expect(averagePrecision([1, 2, 3], [1, 4, 2, 3], 3)).toBeCloseTo(5 / 9, 10);
  });

  it('includes hits up to the cutoff', () => {
    // rank 1: 1/1, rank 3: 2/3, rank 4: 3/4 => 29/12 / 3
    expect(averagePrecision([1, 2, 3], [1, 4, 2, 3], 4)).toBeCloseTo(29 / 36, 10);
  });

  it('returns 1 when every relevant item leads the ranking', () => {
    expect(averagePrecision([1, 2], [2, 1, 3], 3)).toBe(1);
  });

  it('returns 0 when no relevant item is in the top-k', () => {
    expect(averagePrecision([1], [2, 3, 1], 2)).toBe(0);
  });

  it('scores a repeated relevant item at each of its ranks', () => {
    // rank 1: 1/1, rank 2: 1/2 (still one distinct hit)
    expect(averagePrecision([1], [1, 1], 2)).toBe(1.5);
  });

  it('throws DegenerateQueryError for empty actual', () => {
    expect(() => averagePrecision([], [1], 1)).toThrow(DegenerateQueryError);
  });
});

// ============================================================================
// reciprocalRank
// ============================================================================

describe('reciprocalRank', () => {
  it('returns 1 when the first prediction is relevant', () => {
    expect(reciprocalRank([1], [1, 2, 3], 3)).toBe(1);
  });

  it('returns 0.5 when the first hit is at rank 2', () => {
    expect(reciprocalRank([2], [3, 2, 1], 3)).toBe(0.5);
  });

  it('uses the first of several hits', () => {
    expect(reciprocalRank([2, 4], [1, 2, 3, 4], 4)).toBe(0.5);
  });

  it('returns 0 when the first hit is past the cutoff', () => {
    expect(reciprocalRank([3], [1, 2, 3], 2)).toBe(0);
  });

  it('returns 0 for empty actual', () => {
    expect(reciprocalRank([], [1, 2], 2)).toBe(0);
  });

  it('returns 0 for an empty ranking', () => {
    expect(reciprocalRank([1], [], 2)).toBe(0);
  });
});

// ============================================================================
// ndcg
// ============================================================================

describe('ndcg', () => {
  it('returns 1 when relevant items fill the top-k in order', () => {
    expect(ndcg([1, 2, 3], [1, 2, 3, 4, 5], 3)).toBe(1);
  });

  it('returns 1 for any order of a fully relevant top-k', () => {
    expect(ndcg([1, 2, 3], [3, 1, 2], 3)).toBeCloseTo(1, 10);
  });

  it('discounts a gap in the ranking', () => {
    // DCG = 1 + 0 + 0.5 = 1.5, IDCG = 1 + 1/log2(3) = 1.6309
    expect(ndcg([1, 3], [1, 2, 3], 3)).toBeCloseTo(0.9197, 4);
  });

  it('discounts a single hit at rank 2', () => {
    expect(ndcg([5], [1, 5], 2)).toBeCloseTo(1 / Math.log2(3), 10);
  });

  it('caps the ideal ranking at k', () => {
    // IDCG uses min(k, |actual|) = 1 position
    expect(ndcg([1, 2, 3], [1, 9], 1)).toBe(1);
  });

  it('returns 0 when nothing relevant is retrieved', () => {
    expect(ndcg([1], [2, 3], 2)).toBe(0);
  });

  it('returns 0 for empty actual', () => {
    expect(ndcg([], [1, 2], 2)).toBe(0);
  });
});

// ============================================================================
// multi-query metrics
// ============================================================================

const QUERIES = [
  { actual: [1], predicted: [1, 2, 3] },
  { actual: [2], predicted: [3, 2, 1] },
];

describe('meanAveragePrecision', () => {
  it('averages AP across queries', () => {
    // AP1 = 1, AP2 = 0.5
    expect(meanAveragePrecision(QUERIES, 3)).toBe(0.75);
  });

  it('applies the cutoff to every query', () => {
    // query 2's hit is at rank 2, outside k=1
    expect(meanAveragePrecision(QUERIES, 1)).toBe(0.5);
  });

  it('throws InvalidArgumentError for zero queries', () => {
    expect(() => meanAveragePrecision([], 3)).toThrow(InvalidArgumentError);
    expect(() => meanAveragePrecision([], 3)).toThrow(
      'Cannot compute meanAveragePrecision over zero queries'
    );
  });

  it('propagates a degenerate query', () => {
    const queries = [...QUERIES, { actual: [], predicted: [1] }];
    expect(() => meanAveragePrecision(queries, 3)).toThrow(DegenerateQueryError);
  });

  it('throws InvalidArgumentError for k < 1', () => {
    expect(() => meanAveragePrecision(QUERIES, 0)).toThrow(InvalidArgumentError);
  });
});

describe('meanReciprocalRank', () => {
  it('averages RR across queries', () => {
    expect(meanReciprocalRank(QUERIES, 3)).toBe(0.75);
  });

  it('scores a query without relevant items as 0', () => {
    const noRelevant: number[] = [];
    const queries = [
      { actual: noRelevant, predicted: [1] },
      { actual: [1], predicted: [1] },
    ];
    expect(meanReciprocalRank(queries, 1)).toBe(0.5);
  });

  it('throws InvalidArgumentError for zero queries', () => {
    expect(() => meanReciprocalRank([], 3)).toThrow(InvalidArgumentError);
  });
});
