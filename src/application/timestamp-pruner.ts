/**
 * Bounds a timestamp list to its first and last `keep` entries.
 *
 * Lists of at most `2 * keep` entries come back as-is (same reference).
 * Longer lists are replaced by head + tail in recorded order; nothing is
 * re-sorted. Throws a RangeError unless `keep` is a positive integer.
 */
export function pruneTimestamps(timestamps: readonly string[], keep: number): readonly string[] {
  if (!Number.isInteger(keep) || keep < 1) {
    throw new RangeError(`keep must be a positive integer, got ${keep}`);
  }
  if (timestamps.length <= 2 * keep) {
    return timestamps;
  }
  return [...timestamps.slice(0, keep), ...timestamps.slice(timestamps.length - keep)];
}
