/**
 * Embedded timestamp as printed by `dmesg --time-format iso` and similar:
 * `2024-10-07T10:17:15,145363-04:00`.
 */
export const TIMESTAMP_PATTERN = /(\d{4}-\d+-\d+T\d+:\d+:\d+,\d+[+-]\d+:\d+)/;

const ISO_TIMESTAMP_RE =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})?$/;

/**
 * Extracts the timestamp from the line containing `matchStart`.
 *
 * Only that one line is searched: the scan is bounded by the nearest
 * newline before `matchStart` and the next newline at or after it.
 * Returns capture group 1 of the first hit (or the whole hit when the
 * pattern has no groups), null when the line has no timestamp or group 1
 * is empty or did not take part in the match.
 */
export function extractTimestamp(
  content: string,
  matchStart: number,
  pattern: RegExp = TIMESTAMP_PATTERN,
): string | null {
  const lineStart = matchStart > 0 ? content.lastIndexOf('\n', matchStart - 1) + 1 : 0;
  let lineEnd = content.indexOf('\n', matchStart);
  if (lineEnd === -1) {
    lineEnd = content.length;
  }

  const line = content.slice(lineStart, lineEnd);
  // Work on a non-global copy so a caller-supplied /g pattern keeps no state between lines.
  const match = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, '')).exec(line);
  if (match === null) return null;
  const value = match.length > 1 ? match[1] : match[0];
  return value !== undefined && value !== '' ? value : null;
}

/** True when the timestamp names its UTC offset (`Z` or `±HH:MM`). */
export function hasUtcOffset(value: string): boolean {
  return /(?:Z|[+-]\d{2}:\d{2})$/.test(value.trim());
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/**
 * Parses an ISO-8601 date-time into epoch milliseconds.
 *
 * A comma fractional-second separator is accepted and treated as a period.
 * Fractions keep sub-millisecond precision. A missing offset is read as UTC.
 * Returns null for anything that is not a real calendar instant.
 */
export function parseTimestamp(value: string): number | null {
  const m = ISO_TIMESTAMP_RE.exec(value.trim().replace(',', '.'));
  if (m === null) return null;

  const [, y, mo, d, h, mi, s, frac, offset] = m;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  let ms = Date.UTC(year, month - 1, day, hour, minute, second);
  if (frac !== undefined) {
    ms += Number(`0.${frac}`) * 1000;
  }

  if (offset !== undefined && offset !== 'Z') {
    const sign = offset.startsWith('-') ? -1 : 1;
    const offHours = Number(offset.slice(1, 3));
    const offMinutes = Number(offset.slice(4, 6));
    if (offHours > 23 || offMinutes > 59) return null;
    ms -= sign * (offHours * 60 + offMinutes) * 60_000;
  }

  return ms;
}
