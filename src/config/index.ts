/**
 * Config Module
 *
 * Exports for programmatic config access.
 */

// Schema and types
export {
  EvaluationConfigSchema,
  PartialEvaluationConfigSchema,
  ThresholdsSchema,
} from './schema.js';
export type { EvaluationConfig, PartialEvaluationConfig, Thresholds } from './schema.js';

// Defaults
export { DEFAULT_CONFIG } from './defaults.js';

// Resolver
export { resolveConfig } from './loader.js';
