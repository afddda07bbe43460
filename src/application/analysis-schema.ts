import { z } from 'zod';
import { rawRuleSchema } from './rule-schema.js';

/**
 * Schema for POST /api/v1/analyze.
 * `rules` must be non-empty: there is no implicit base rule set here.
 */
export const analyzeRequestSchema = z.object({
  content: z.string(),
  source: z.string().min(1).max(255),
  rules: z.array(rawRuleSchema).min(1, 'At least one rule is required'),
  group: z.boolean().optional().default(true),
  num_timestamps: z.number().int().min(1).optional().default(3),
  collapse_interval_seconds: z.number().int().min(0).optional().default(60),
});

/**
 * Schema for POST /api/v1/analyze/dmesg.
 * `args` is left open here and validated after merging over configured defaults.
 */
export const dmesgRequestSchema = z.object({
  content: z.string(),
  args: z.record(z.string(), z.unknown()).optional().default({}),
});
