import { z } from 'zod';
import type { ValidationIssue } from '../domain/index.js';

/**
 * Zod schema for a rule supplied by configuration or a request body.
 *
 * Only the shape is checked here. Compiling the regex and mapping
 * category/severity onto the closed enums is the rule-set composer's job,
 * so both paths report the same errors.
 */
export const rawRuleSchema = z.object({
  regex: z.string().min(1),
  message: z.string().min(1).max(2048),
  flags: z.string().optional(),
  category: z.string().min(1).optional(),
  severity: z.union([z.string().min(1), z.number().int()]).optional(),
});

/** Flattens zod issues into the domain's path/message pairs. */
export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}
