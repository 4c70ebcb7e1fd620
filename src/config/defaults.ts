/**
 * Default Configuration Values
 *
 * resolveConfig() merges caller overrides ON TOP of these defaults.
 */

import type { EvaluationConfig } from './schema.js';

export const DEFAULT_CONFIG: EvaluationConfig = {
  k: 10,
  // 5 percentage points on the 0-1 scale
  regression_threshold: 0.05,
  thresholds: {},
};
