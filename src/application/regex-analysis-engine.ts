import { ValidationError } from '../domain/index.js';
import type { MatchEvent, MatchEventData, ValidationIssue } from '../domain/index.js';
import type { ErrorRule } from '../domain/rules/index.js';
import { extractTimestamp, TIMESTAMP_PATTERN } from './timestamp-extractor.js';
import { MatchGrouper, buildPendingEvent, normalizeMatch } from './match-grouper.js';
import type { PendingMatchEvent } from './match-grouper.js';
import { pruneTimestamps } from './timestamp-pruner.js';
import { defaultAnalysisLogger } from './analysis-logger.js';
import type { AnalysisLogger } from './analysis-logger.js';

export interface AnalyzeOptions {
  /** Merge matches sharing a match key into one event. Default true. */
  readonly group?: boolean;
  /** Head/tail size kept when a timestamp list outgrows twice this value. Default 3. */
  readonly numTimestamps?: number;
  /** Repeat timestamps closer than this to a recorded one are dropped. Default 60. */
  readonly collapseIntervalSeconds?: number;
  /** Pattern used to find a timestamp on the matched line. */
  readonly timestampPattern?: RegExp;
  readonly log?: AnalysisLogger;
}

/** Global, non-sticky copy of a rule pattern for left-to-right scanning. */
function scanningCopy(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, `${pattern.flags.replace(/[gy]/g, '')}g`);
}

/**
 * All non-overlapping matches of `pattern` in `content`, left to right.
 * The caller's RegExp is left untouched.
 */
export function scanMatches(content: string, pattern: RegExp): Iterable<RegExpMatchArray> {
  return content.matchAll(scanningCopy(pattern));
}

function checkOptions(numTimestamps: number, collapseIntervalSeconds: number): void {
  const issues: ValidationIssue[] = [];
  if (!Number.isInteger(numTimestamps) || numTimestamps < 1) {
    issues.push({ path: 'numTimestamps', message: `Must be an integer of at least 1, got ${numTimestamps}` });
  }
  if (!Number.isFinite(collapseIntervalSeconds) || collapseIntervalSeconds < 0) {
    issues.push({
      path: 'collapseIntervalSeconds',
      message: `Must be a non-negative number, got ${collapseIntervalSeconds}`,
    });
  }
  if (issues.length > 0) {
    throw new ValidationError('Invalid analysis options', issues);
  }
}

/** Freezes a pending event into its returned form, pruning the timestamp list. */
function finalizeEvent(event: PendingMatchEvent, numTimestamps: number): MatchEvent {
  const { timestamps, timestamp, ...rest } = event.data;
  const data: MatchEventData = {
    ...rest,
    ...(timestamps !== undefined ? { timestamps: pruneTimestamps(timestamps, numTimestamps) } : {}),
    ...(timestamp !== undefined ? { timestamp } : {}),
  };
  return {
    category: event.category,
    severity: event.severity,
    description: event.description,
    data,
  };
}

/**
 * Regex analysis engine — applies an ordered rule list to one content blob.
 *
 * Pure orchestration over in-memory strings:
 * 1. Rules run in list order; each finds all non-overlapping matches.
 * 2. Each match gets the timestamp of the line it starts on and is
 *    normalized into match content.
 * 3. Grouped: matches merge by match key (first writer wins the
 *    classification) with timestamp collapsing. Ungrouped: one event per
 *    match carrying a single `timestamp`.
 * 4. Timestamp lists longer than `2 * numTimestamps` are cut to head + tail.
 *
 * Events come back in first-creation order. Nothing is shared between
 * calls; returned events are fresh objects. Out-of-range options raise a
 * ValidationError before any rule runs.
 */
export function analyzeContent(
  content: string,
  source: string,
  rules: readonly ErrorRule[],
  options: AnalyzeOptions = {},
): MatchEvent[] {
  const group = options.group ?? true;
  const numTimestamps = options.numTimestamps ?? 3;
  const timestampPattern = options.timestampPattern ?? TIMESTAMP_PATTERN;
  const collapseIntervalSeconds = options.collapseIntervalSeconds ?? 60;
  const log = options.log ?? defaultAnalysisLogger;
  checkOptions(numTimestamps, collapseIntervalSeconds);

  const grouper = new MatchGrouper(collapseIntervalSeconds, log);
  const ungrouped: PendingMatchEvent[] = [];
  let matchCount = 0;

  for (const rule of rules) {
    for (const match of scanMatches(content, rule.pattern)) {
      matchCount++;
      const timestamp = extractTimestamp(content, match.index ?? 0, timestampPattern);
      const matchContent = normalizeMatch(match);

      if (group) {
        grouper.record(rule, matchContent, source, timestamp);
        continue;
      }

      const event = buildPendingEvent(rule, matchContent, source);
      if (timestamp !== null) {
        event.data.timestamp = timestamp;
      }
      ungrouped.push(event);
    }
  }

  const pending = group ? grouper.values() : ungrouped;

  log.debug(
    { source, ruleCount: rules.length, matchCount, eventCount: pending.length, group },
    'Regex analysis complete',
  );

  return pending.map((event) => finalizeEvent(event, numTimestamps));
}
