/**
 * Configuration Resolver
 *
 * 1. Validate caller overrides against the partial schema
 * 2. Merge them with defaults (caller values override defaults)
 * 3. Validate the merged result
 *
 * Config arrives as a value from the caller; nothing is read from disk
 * or the environment.
 */

import type { ZodError } from 'zod';
import {
  EvaluationConfigSchema,
  PartialEvaluationConfigSchema,
  type EvaluationConfig,
} from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { ConfigError } from '../errors/index.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with source values overriding target.
 * undefined in source leaves the target value in place.
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = target[key];

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }

  return result;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}

/**
 * Resolve a complete config from optional overrides.
 *
 * @throws ConfigError if the overrides or the merged config are invalid
 *
 * @example
 * resolveConfig({ k: 5 }) // => { k: 5, regression_threshold: 0.05, thresholds: {} }
 */
export function resolveConfig(overrides: unknown = {}): EvaluationConfig {
  const partial = PartialEvaluationConfigSchema.safeParse(overrides);

  if (!partial.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(partial.error)}`);
  }

  const merged = EvaluationConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, partial.data));

  if (!merged.success) {
    throw new ConfigError(`Invalid configuration:\n${formatIssues(merged.error)}`);
  }

  return merged.data;
}
