/**
 * Test data factories for reports.
 */

import type { AggregateMetrics, MetricsReport } from '../eval/types.js';

/** Build AggregateMetrics with sensible defaults. Override any metric. */
export function makeMetrics(overrides: Partial<AggregateMetrics> = {}): AggregateMetrics {
  return {
    map: 0.8,
    mrr: 0.75,
    ndcg: 0.7,
    precision: 0.5,
    recall: 0.9,
    f1: 0.6,
    hit_rate: 1,
    ...overrides,
  };
}

/** Build a MetricsReport around the given aggregate. */
export function makeReport(aggregate: AggregateMetrics, k = 10): MetricsReport {
  return { k, queryCount: 4, perQuery: [], aggregate };
}
