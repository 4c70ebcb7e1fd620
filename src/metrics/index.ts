/**
 * Metrics Module
 *
 * Pure ranking-quality metric functions and their input types.
 */

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
} from './metrics.js';

export { CutoffSchema, assertCutoff, assertQueries } from './validation.js';

export type { RelevanceSet, RankedList, RankedQuery, MetricName } from './types.js';
