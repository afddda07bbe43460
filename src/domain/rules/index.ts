export type { ErrorRule, RawRuleConfig, RuleSpec } from './types.js';
export { isErrorRule } from './types.js';
export type { ErrorRuleOptions } from './error-rule.js';
export { createErrorRule } from './error-rule.js';
export { DMESG_ERROR_RULES, UNKNOWN_DMESG_RULE } from './dmesg-rules.js';
