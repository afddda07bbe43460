import type { EventCategory, EventPriority } from '../event.js';

/**
 * An error rule: what text constitutes a notable event, and how to classify it.
 *
 * Rules are frozen once built and are safe to share between analysis calls.
 * The engine never scans with `pattern` itself; it works on a private
 * global copy, so `pattern.lastIndex` is never advanced.
 */
export interface ErrorRule {
  readonly pattern: RegExp;
  readonly message: string;
  readonly category: EventCategory;
  readonly severity: EventPriority;
}

/**
 * Rule as it arrives from configuration or a request body.
 *
 * `category` and `severity` are free-form here and only become enum values
 * after passing through the rule-set composer.
 */
export interface RawRuleConfig {
  readonly regex: string;
  readonly message: string;
  readonly flags?: string;
  readonly category?: string;
  readonly severity?: string | number;
}

/** Either form accepted at the composer boundary. */
export type RuleSpec = ErrorRule | RawRuleConfig;

export function isErrorRule(spec: RuleSpec): spec is ErrorRule {
  return 'pattern' in spec && spec.pattern instanceof RegExp;
}
