/**
 * Core domain types for the analysis event model.
 *
 * These types define the canonical shape of an event as it leaves the
 * analysis engine. They carry no framework dependencies.
 */

/** Shared event categories. UNKNOWN is for events that cannot be classified by how they were collected. */
export const EVENT_CATEGORIES = [
  'SSH',
  'RAS',
  'IO',
  'OS',
  'PLATFORM',
  'APPLICATION',
  'MEMORY',
  'STORAGE',
  'COMPUTE',
  'FW',
  'SW_DRIVER',
  'BIOS',
  'INFRASTRUCTURE',
  'RUNTIME',
  'UNKNOWN',
] as const;

export type EventCategory = (typeof EVENT_CATEGORIES)[number];

/** Ordered priority levels, lowest first. */
export const EVENT_PRIORITIES = ['INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type EventPriority = (typeof EVENT_PRIORITIES)[number];

/** Numeric rank of each priority. Also the accepted numeric form in raw rule input. */
export const PRIORITY_RANK: Readonly<Record<EventPriority, number>> = {
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
  CRITICAL: 4,
};

function isEventCategory(value: string): value is EventCategory {
  return (EVENT_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Maps a free-form category string onto the closed category set.
 *
 * Input is normalized first: trimmed, upper-cased, whitespace and hyphens
 * replaced by underscores ("sw-driver" → "SW_DRIVER").
 * Returns undefined for anything outside the set.
 */
export function parseEventCategory(input: string): EventCategory | undefined {
  const normalized = input.trim().toUpperCase().replace(/[\s-]/g, '_');
  return isEventCategory(normalized) ? normalized : undefined;
}

/**
 * Maps a priority name (case-insensitive) or its numeric rank onto EventPriority.
 * Returns undefined for unknown names and out-of-range numbers.
 */
export function parseEventPriority(input: string | number): EventPriority | undefined {
  if (typeof input === 'number') {
    return EVENT_PRIORITIES.find((p) => PRIORITY_RANK[p] === input);
  }
  const normalized = input.trim().toUpperCase();
  return EVENT_PRIORITIES.find((p) => p === normalized);
}

/** True when `priority` is at or above `threshold`. */
export function isAtLeast(priority: EventPriority, threshold: EventPriority): boolean {
  return PRIORITY_RANK[priority] >= PRIORITY_RANK[threshold];
}

/**
 * Captured text of a match.
 *
 * A bare string for a whole match or a single surviving capture group,
 * otherwise the ordered list of non-empty captures (or lines, for a
 * multi-line whole match).
 */
export type MatchContent = string | readonly string[];

/**
 * Payload of a match event.
 *
 * Grouped analysis records `timestamps` (first-seen order, collapsed and
 * pruned); ungrouped analysis records a single `timestamp`. Either is
 * absent when the matched line carried no timestamp.
 */
export interface MatchEventData {
  readonly match_content: MatchContent;
  readonly source: string;
  readonly count: number;
  readonly timestamps?: readonly string[];
  readonly timestamp?: string;
}

/**
 * A logical occurrence of a rule match.
 *
 * `category`, `severity` and `description` are copied from the rule that
 * created the event; later matches sharing the same key only bump the
 * count and timestamps.
 */
export interface MatchEvent {
  readonly category: EventCategory;
  readonly severity: EventPriority;
  readonly description: string;
  readonly data: MatchEventData;
}
