/**
 * Glucose reading types - CGM entries from the Nightscout entries feed
 */

/**
 * Trend direction codes reported with Nightscout sgv entries
 */
export const TREND_DIRECTIONS = [
  "DoubleUp",
  "SingleUp",
  "FortyFiveUp",
  "Flat",
  "FortyFiveDown",
  "SingleDown",
  "DoubleDown",
  "NOT COMPUTABLE",
  "RATE OUT OF RANGE",
] as const;

export type TrendDirection = (typeof TREND_DIRECTIONS)[number];

/**
 * A single sensor reading, normalized from a Nightscout entry
 */
export interface GlucoseReading {
  /** Unix timestamp in milliseconds */
  readonly timestamp: number;
  /** Sensor glucose value in mg/dL */
  readonly value: number | null;
  /** Trend code as sent by the uploader, usually a TrendDirection; unknown codes are kept verbatim */
  readonly trendDirection: string | null;
  /** Change from the previous reading in mg/dL */
  readonly delta: number | null;
}

export function isTrendDirection(value: string): value is TrendDirection {
  return (TREND_DIRECTIONS as readonly string[]).includes(value);
}
