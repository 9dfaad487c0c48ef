/**
 * Lenient numeric and timestamp parsing
 *
 * Every parser here returns null for input it cannot read. A value that
 * fails to parse is treated as absent by the pipeline, never as an error.
 */

const DECIMAL_PATTERN = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parse decimal text such as "4.5", "-2", ".5" or "1e2"
 */
export function parseDecimal(text: string | null | undefined): number | null {
  if (text == null) return null;
  const trimmed = text.trim();
  if (!DECIMAL_PATTERN.test(trimmed)) return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

/**
 * Normalize a numeric-as-text feed field to trimmed text.
 * Numbers become their decimal text; empty strings and the number 0 are
 * absent. Text "0" is kept.
 */
export function toFieldText(value: unknown): string | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value !== 0 ? String(value) : null;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed === "" ? null : trimmed;
  }
  return null;
}

/**
 * Read an optional numeric feed field that may arrive as a number or text
 */
export function toOptionalNumber(value: unknown): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    return parseDecimal(value);
  }
  return null;
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d+))?)?)?(Z|[+-]\d{2}:?\d{2})?$/i;

/**
 * Parse an ISO-8601 timestamp into Unix milliseconds.
 * Timestamps without a zone designator are read as UTC.
 */
export function parseIsoTimestamp(value: string | null | undefined): number | null {
  if (!value) return null;
  const match = value.trim().match(ISO_PATTERN);
  if (!match) return null;

  const [, year, month, day, hour = "0", minute = "0", second = "0", fraction = "", zone] = match;

  const monthIndex = parseInt(month, 10) - 1;
  const dayOfMonth = parseInt(day, 10);
  const hours = parseInt(hour, 10);
  const minutes = parseInt(minute, 10);
  const seconds = parseInt(second, 10);
  if (monthIndex < 0 || monthIndex > 11 || hours > 23 || minutes > 59 || seconds > 59) {
    return null;
  }

  const millis = fraction ? parseInt(fraction.slice(0, 3).padEnd(3, "0"), 10) : 0;
  const utc = Date.UTC(parseInt(year, 10), monthIndex, dayOfMonth, hours, minutes, seconds, millis);

  // Reject rollover dates such as 2024-02-31
  if (new Date(utc).getUTCDate() !== dayOfMonth) return null;

  return utc - zoneOffsetMinutes(zone) * 60 * 1000;
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (!zone || zone.toUpperCase() === "Z") return 0;
  const sign = zone.startsWith("-") ? -1 : 1;
  const digits = zone.slice(1).replace(":", "");
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = parseInt(digits.slice(2, 4), 10);
  return sign * (hours * 60 + minutes);
}
