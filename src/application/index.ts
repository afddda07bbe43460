export type { AnalysisLogger } from './analysis-logger.js';
export { defaultAnalysisLogger } from './analysis-logger.js';
export { TIMESTAMP_PATTERN, extractTimestamp, hasUtcOffset, parseTimestamp } from './timestamp-extractor.js';
export { isWithinInterval } from './time-window.js';
export { pruneTimestamps } from './timestamp-pruner.js';
export type { PendingMatchEvent, PendingEventData } from './match-grouper.js';
export { MatchGrouper, normalizeMatch, matchKey } from './match-grouper.js';
export type { AnalyzeOptions } from './regex-analysis-engine.js';
export { analyzeContent, scanMatches } from './regex-analysis-engine.js';
export { rawRuleSchema, toValidationIssues } from './rule-schema.js';
export { composeRules, compileRawRule } from './rule-set-composer.js';
export type { ExecutionStatus, TaskResult } from './task-result.js';
export { EXECUTION_STATUSES, deriveStatus } from './task-result.js';
export type { DmesgAnalyzerArgs, DmesgAnalyzerArgsInput } from './dmesg-analyzer.js';
export {
  DmesgAnalyzer,
  DEFAULT_DMESG_ARGS,
  dmesgAnalyzerArgsSchema,
  filterDmesg,
  uncoveredLines,
} from './dmesg-analyzer.js';
export { analyzeRequestSchema, dmesgRequestSchema } from './analysis-schema.js';
