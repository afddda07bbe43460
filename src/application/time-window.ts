import { hasUtcOffset, parseTimestamp } from './timestamp-extractor.js';
import type { AnalysisLogger } from './analysis-logger.js';

/**
 * Decides whether a repeat timestamp is redundant for a grouped event.
 *
 * Returns true (collapse, do not record) only when at least one existing
 * timestamp parses and lies strictly within `intervalSeconds` of the new
 * one. A new timestamp that does not parse is logged and reported as not
 * within the interval, so the caller records it. Existing timestamps that
 * do not parse are skipped, and so are pairs where only one side names
 * its UTC offset.
 */
export function isWithinInterval(
  newTimestamp: string,
  existingTimestamps: readonly string[],
  intervalSeconds: number,
  log: AnalysisLogger,
): boolean {
  const newMs = parseTimestamp(newTimestamp);
  if (newMs === null) {
    log.warn({ timestamp: newTimestamp }, 'Failed to parse date from timestamp');
    return false;
  }

  const newHasOffset = hasUtcOffset(newTimestamp);
  const intervalMs = intervalSeconds * 1000;
  for (const existing of existingTimestamps) {
    const existingMs = parseTimestamp(existing);
    if (existingMs === null || hasUtcOffset(existing) !== newHasOffset) continue;
    if (Math.abs(newMs - existingMs) < intervalMs) {
      return true;
    }
  }
  return false;
}
