/**
 * Timestamp and countdown helpers
 */

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * Format a moment as ISO-8601 UTC with the milliseconds zeroed,
 * e.g. "2026-10-18T14:03:27.000Z". Every timestamp this package writes
 * for its own bookkeeping uses this shape.
 */
export function formatUtc(date: Date): string {
  return `${date.toISOString().slice(0, 19)}.000Z`;
}

/**
 * Parse any timestamp Date understands. Returns null for empty or invalid input.
 */
export function parseTimestamp(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Canonical ISO-8601 UTC form of an upstream timestamp ("" when unparsable).
 */
export function toIsoUtc(value: string | null | undefined): string {
  const parsed = parseTimestamp(value);
  return parsed ? parsed.toISOString() : '';
}

function wholeSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Compact duration: "4d2h" above a day, "1h12m" above an hour, "45m" otherwise.
 */
export function formatDuration(seconds: number): string {
  const totalMinutes = Math.floor(seconds / MINUTE);
  const days = Math.floor(totalMinutes / (DAY / MINUTE));
  const hours = Math.floor((totalMinutes % (DAY / MINUTE)) / 60);
  const minutes = totalMinutes % 60;

  if (days > 0) return `${days}d${hours}h`;
  if (hours > 0) return `${hours}h${minutes}m`;
  return `${minutes}m`;
}

/**
 * Human-readable time from `now` until `timestamp`.
 * "" when the timestamp is missing or unparsable, "0 min" once it has passed.
 */
export function timeUntil(timestamp: string | null | undefined, now: Date): string {
  const target = parseTimestamp(timestamp);
  if (!target) return '';

  const delta = wholeSeconds(target) - wholeSeconds(now);
  if (delta <= 0) return '0 min';
  return formatDuration(delta);
}

/**
 * How long ago `timestamp` was, e.g. "12m ago". "" when unknown.
 */
export function timeSince(timestamp: string | null | undefined, now: Date): string {
  const then = parseTimestamp(timestamp);
  if (!then) return '';

  const delta = wholeSeconds(now) - wholeSeconds(then);
  if (delta < MINUTE) return 'just now';
  return `${formatDuration(delta)} ago`;
}
