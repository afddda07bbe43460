import type { EventCategory, EventPriority, MatchContent } from '../domain/index.js';
import type { ErrorRule } from '../domain/rules/index.js';
import { isWithinInterval } from './time-window.js';
import { defaultAnalysisLogger } from './analysis-logger.js';
import type { AnalysisLogger } from './analysis-logger.js';

/** Mutable event payload used while one analysis call is in progress. */
export interface PendingEventData {
  readonly match_content: MatchContent;
  readonly source: string;
  count: number;
  timestamps?: string[];
  timestamp?: string;
}

/** Event under construction. Owned by exactly one analysis call. */
export interface PendingMatchEvent {
  readonly category: EventCategory;
  readonly severity: EventPriority;
  readonly description: string;
  readonly data: PendingEventData;
}

/**
 * Turns a raw regex match into match content.
 *
 * - Patterns with capture groups yield the list of groups, otherwise the
 *   whole match.
 * - A whole match spanning lines is trimmed and split into its lines.
 * - Lists drop empty and unmatched entries; a single survivor collapses
 *   to a bare string.
 */
export function normalizeMatch(match: RegExpMatchArray): MatchContent {
  let value: string | readonly (string | undefined)[] =
    match.length > 1 ? match.slice(1) : (match[0] ?? '');

  if (typeof value === 'string' && value.includes('\n')) {
    value = value.trim().split('\n');
  }

  if (typeof value === 'string') {
    return value;
  }

  const kept = value.filter((v): v is string => v !== undefined && v !== '');
  if (kept.length === 1 && kept[0] !== undefined) {
    return kept[0];
  }
  return kept;
}

/**
 * Canonical grouping key for match content.
 *
 * JSON keeps list order and element boundaries, so `"a,b"` and
 * `["a", "b"]` never share a key.
 */
export function matchKey(content: MatchContent): string {
  return JSON.stringify(content);
}

/** Seeds a new event from the rule that produced the first match. */
export function buildPendingEvent(
  rule: ErrorRule,
  content: MatchContent,
  source: string,
): PendingMatchEvent {
  return {
    category: rule.category,
    severity: rule.severity,
    description: rule.message,
    data: { match_content: content, source, count: 1 },
  };
}

/**
 * Groups matches by match key within a single analysis call.
 *
 * Backed by an insertion-ordered Map<key, event>. The first match of a key
 * creates the event and fixes its classification; later matches of the
 * same key (from any rule) bump the count and record their timestamp
 * unless it falls within the collapse interval of one already recorded.
 */
export class MatchGrouper {
  private readonly events: Map<string, PendingMatchEvent> = new Map();
  private readonly collapseIntervalSeconds: number;
  private readonly log: AnalysisLogger;

  constructor(collapseIntervalSeconds: number = 60, log: AnalysisLogger = defaultAnalysisLogger) {
    this.collapseIntervalSeconds = collapseIntervalSeconds;
    this.log = log;
  }

  /** Merge a match into its event, creating the event on first sight. */
  record(
    rule: ErrorRule,
    content: MatchContent,
    source: string,
    timestamp: string | null,
  ): PendingMatchEvent {
    const key = matchKey(content);
    const existing = this.events.get(key);

    if (existing !== undefined) {
      existing.data.count += 1;
      if (timestamp !== null) {
        const timestamps = existing.data.timestamps ?? [];
        if (!isWithinInterval(timestamp, timestamps, this.collapseIntervalSeconds, this.log)) {
          timestamps.push(timestamp);
          existing.data.timestamps = timestamps;
        }
      }
      return existing;
    }

    const created = buildPendingEvent(rule, content, source);
    if (timestamp !== null) {
      created.data.timestamps = [timestamp];
    }
    this.events.set(key, created);
    return created;
  }

  /** Events in first-creation order. */
  values(): PendingMatchEvent[] {
    return [...this.events.values()];
  }

  /** Number of distinct match keys seen. */
  get size(): number {
    return this.events.size;
  }
}
