/**
 * Backup Monitor — src/lib/time.ts
 * WHAT: Timestamp normalization, retention cutoffs and ISO week keys.
 * WHY: Every read/evict path compares `timestamp` as TEXT. That only matches
 *      chronological order if every stored value has the same shape, so all
 *      timestamps go through normalizeTimestamp() on the way in.
 * DOCS:
 *  - ISO week date: https://en.wikipedia.org/wiki/ISO_week_date
 *  - Date.prototype.toISOString: https://developer.mozilla.org/en-US/docs/Web/JavaScript/Reference/Global_Objects/Date/toISOString
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

// `date -Iseconds` writes 2025-01-15T03:00:00+01:00; `date -u +%FT%TZ` writes
// ...Z; some scripts write a bare date. All three start with YYYY-MM-DD.
const ISO_PREFIX_RE = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/;

/** A source of "now". Injected so tests can pin the clock. */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/** Date.parse rolls 2025-02-30 over to March 2nd; reject days the month doesn't have. */
function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/**
 * Parse an ISO-8601 timestamp and re-emit it as UTC with millisecond precision.
 * Returns null for anything that isn't an ISO-8601 date or date-time.
 *
 * @example
 * normalizeTimestamp("2025-01-15T03:00:00+01:00") // "2025-01-15T02:00:00.000Z"
 * normalizeTimestamp("last tuesday")               // null
 */
export function normalizeTimestamp(value: string): string | null {
  const trimmed = value.trim();
  const prefix = ISO_PREFIX_RE.exec(trimmed);
  if (!prefix) return null;
  if (!isCalendarDate(Number(prefix[1]), Number(prefix[2]), Number(prefix[3]))) return null;
  const ms = Date.parse(trimmed.replace(" ", "T"));
  if (Number.isNaN(ms)) return null;
  const iso = new Date(ms).toISOString();
  // Years outside 0000-9999 serialize as ±YYYYYY and would break TEXT ordering
  return iso.length === 24 ? iso : null;
}

/**
 * Lower bound of a trailing window: `now - days`, in the stored timestamp format.
 * Used for both the retention cutoff (rows strictly before it are evicted) and
 * the aggregation window (rows at or after it are included).
 */
export function windowStart(now: Date, days: number): string {
  return new Date(now.getTime() - days * MS_PER_DAY).toISOString();
}

/**
 * ISO-8601 week key, e.g. "2025-W03". Computed in UTC, so it doesn't depend on
 * the host's locale or timezone.
 *
 * The ISO week-year can differ from the calendar year near January 1st:
 * 2024-12-30 is in 2025-W01, 2021-01-03 is in 2020-W53.
 */
export function isoWeekKey(timestamp: string): string {
  const date = new Date(timestamp);
  const day = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  // Monday=1 ... Sunday=7
  const weekday = new Date(day).getUTCDay() || 7;
  // The Thursday of this week decides which week-year it belongs to
  const thursday = new Date(day + (4 - weekday) * MS_PER_DAY);
  const weekYear = thursday.getUTCFullYear();
  const jan1 = Date.UTC(weekYear, 0, 1);
  const week = Math.ceil(((thursday.getTime() - jan1) / MS_PER_DAY + 1) / 7);
  return `${weekYear}-W${String(week).padStart(2, "0")}`;
}
