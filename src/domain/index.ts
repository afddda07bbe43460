export type { EventCategory, EventPriority, MatchContent, MatchEvent, MatchEventData } from './event.js';
export {
  EVENT_CATEGORIES,
  EVENT_PRIORITIES,
  PRIORITY_RANK,
  parseEventCategory,
  parseEventPriority,
  isAtLeast,
} from './event.js';
export type { ValidationIssue } from './errors.js';
export { ValidationError } from './errors.js';
export type { ErrorRule, RawRuleConfig, RuleSpec, ErrorRuleOptions } from './rules/index.js';
export { isErrorRule, createErrorRule, DMESG_ERROR_RULES, UNKNOWN_DMESG_RULE } from './rules/index.js';
