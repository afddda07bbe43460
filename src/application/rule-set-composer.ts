import { ValidationError, parseEventCategory, parseEventPriority } from '../domain/index.js';
import type { ValidationIssue } from '../domain/index.js';
import { createErrorRule, isErrorRule } from '../domain/rules/index.js';
import type { ErrorRule, RawRuleConfig, RuleSpec } from '../domain/rules/index.js';

/** Flags a raw rule may carry. Scanning flags (g, y) are managed by the engine. */
const ALLOWED_FLAGS_RE = /^[imsu]*$/;

/**
 * Compiles one raw rule into an ErrorRule.
 *
 * Collects every problem with the entry before failing, so a caller sees
 * a bad regex and a bad category in one report.
 */
export function compileRawRule(raw: RawRuleConfig, index: number): ErrorRule {
  const issues: ValidationIssue[] = [];
  const at = (field: string): string => `${index}.${field}`;

  let pattern: RegExp | undefined;
  const flags = raw.flags ?? '';
  if (!ALLOWED_FLAGS_RE.test(flags)) {
    issues.push({ path: at('flags'), message: `Unsupported regex flags "${flags}" (allowed: i, m, s, u)` });
  } else {
    try {
      pattern = new RegExp(raw.regex, flags);
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      issues.push({ path: at('regex'), message: `Invalid regex: ${reason}` });
    }
  }

  const category = raw.category === undefined ? 'UNKNOWN' : parseEventCategory(raw.category);
  if (category === undefined) {
    issues.push({ path: at('category'), message: `Unknown event category "${String(raw.category)}"` });
  }

  const severity = raw.severity === undefined ? 'ERROR' : parseEventPriority(raw.severity);
  if (severity === undefined) {
    issues.push({ path: at('severity'), message: `Unknown event priority "${String(raw.severity)}"` });
  }

  if (pattern === undefined || category === undefined || severity === undefined || issues.length > 0) {
    throw new ValidationError(`Invalid custom rule at index ${index}`, issues);
  }

  return createErrorRule(pattern, raw.message, { category, severity });
}

/**
 * Rule-set composer — puts caller-supplied rules in front of a base list.
 *
 * - Null/empty custom input returns a copy of `base`.
 * - Compiled rules pass through; raw rules are compiled exactly once here.
 * - Result order: custom rules as given, then base rules as given.
 *
 * Neither input is mutated. Any invalid raw entry fails the whole
 * composition with a ValidationError before analysis can start.
 */
export function composeRules(
  custom: readonly RuleSpec[] | null | undefined,
  base: readonly ErrorRule[],
): ErrorRule[] {
  if (custom === null || custom === undefined || custom.length === 0) {
    return [...base];
  }

  const converted = custom.map((spec, index) =>
    isErrorRule(spec) ? spec : compileRawRule(spec, index),
  );
  return [...converted, ...base];
}
