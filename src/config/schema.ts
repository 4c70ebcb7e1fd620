/**
 * Configuration Schema
 *
 * Defines the shape of the evaluation config using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Minimum acceptable aggregate scores.
 * Metrics left out are not checked.
 */
export const ThresholdsSchema = z.object({
  mrr: z.number().min(0).max(1).optional(),
  map: z.number().min(0).max(1).optional(),
  ndcg: z.number().min(0).max(1).optional(),
  precision: z.number().min(0).max(1).optional(),
  recall: z.number().min(0).max(1).optional(),
  f1: z.number().min(0).max(1).optional(),
  hit_rate: z.number().min(0).max(1).optional(),
});

export type Thresholds = z.infer<typeof ThresholdsSchema>;

/**
 * Root configuration schema
 */
export const EvaluationConfigSchema = z.object({
  k: z
    .number()
    .int()
    .min(1)
    .max(1000)
    .describe('Cutoff applied to every ranked list (1-1000)'),
  regression_threshold: z
    .number()
    .min(0)
    .max(1)
    .describe('Absolute change a metric must exceed to count as a regression or improvement'),
  thresholds: ThresholdsSchema.describe('Minimum aggregate scores checked by checkThresholds'),
});

export type EvaluationConfig = z.infer<typeof EvaluationConfigSchema>;

/**
 * Partial config for merging caller overrides with defaults
 */
export const PartialEvaluationConfigSchema = EvaluationConfigSchema.deepPartial().strict();
export type PartialEvaluationConfig = z.infer<typeof PartialEvaluationConfigSchema>;
