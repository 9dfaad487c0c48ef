/**
 * Fixed-offset local time helpers
 *
 * Reports are laid out in one fixed UTC offset (+09:00 by default). All
 * comparisons use Unix milliseconds; the offset is applied only here.
 */

const MINUTE_MS = 60 * 1000;
const DAY_MS = 24 * 60 * MINUTE_MS;

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Format a timestamp as local HH:MM
 */
export function formatLocalTime(timestampMs: number, utcOffsetMinutes: number): string {
  const local = new Date(timestampMs + utcOffsetMinutes * MINUTE_MS);
  return `${pad2(local.getUTCHours())}:${pad2(local.getUTCMinutes())}`;
}

/**
 * Format a timestamp as the local date YYYY-MM-DD
 */
export function formatLocalDate(timestampMs: number, utcOffsetMinutes: number): string {
  const local = new Date(timestampMs + utcOffsetMinutes * MINUTE_MS);
  return `${local.getUTCFullYear()}-${pad2(local.getUTCMonth() + 1)}-${pad2(local.getUTCDate())}`;
}

/**
 * UTC bounds of a local calendar day: [start, end)
 */
export function localDayWindow(
  date: string,
  utcOffsetMinutes: number
): { start: number; end: number } {
  const match = date.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!match) {
    throw new Error(`Invalid date: ${date} (expected YYYY-MM-DD)`);
  }

  const [, year, month, day] = match;
  const midnightUtc = Date.UTC(parseInt(year, 10), parseInt(month, 10) - 1, parseInt(day, 10));
  if (formatLocalDate(midnightUtc, 0) !== date) {
    throw new Error(`Invalid date: ${date}`);
  }

  const start = midnightUtc - utcOffsetMinutes * MINUTE_MS;
  return { start, end: start + DAY_MS };
}

/**
 * Parse "+09:00", "-0530" or "Z" into minutes east of UTC
 */
export function parseUtcOffset(value: string): number {
  const trimmed = value.trim();
  if (trimmed.toUpperCase() === "Z") return 0;

  const match = trimmed.match(/^([+-])(\d{2}):?(\d{2})$/);
  if (!match) {
    throw new Error(`Invalid UTC offset: ${value} (expected ±HH:MM)`);
  }

  const [, sign, hours, minutes] = match;
  if (parseInt(minutes, 10) > 59) {
    throw new Error(`Invalid UTC offset: ${value}`);
  }

  const total = parseInt(hours, 10) * 60 + parseInt(minutes, 10);
  return sign === "-" ? -total : total;
}
