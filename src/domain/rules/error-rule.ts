import type { EventCategory, EventPriority } from '../event.js';
import type { ErrorRule } from './types.js';

export interface ErrorRuleOptions {
  readonly category?: EventCategory;
  readonly severity?: EventPriority;
}

/** Builds a frozen ErrorRule. Category defaults to UNKNOWN, severity to ERROR. */
export function createErrorRule(
  pattern: RegExp,
  message: string,
  options: ErrorRuleOptions = {},
): ErrorRule {
  return Object.freeze({
    pattern,
    message,
    category: options.category ?? 'UNKNOWN',
    severity: options.severity ?? 'ERROR',
  });
}
