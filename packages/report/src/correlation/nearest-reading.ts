/**
 * Nearest-reading lookup between treatments and the CGM series
 */

import type { GlucoseReading } from "../models/index.js";

/**
 * Index of the first reading at or after the timestamp
 * (readings.length when every reading is earlier)
 */
function lowerBound(readings: readonly GlucoseReading[], timestamp: number): number {
  let low = 0;
  let high = readings.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (readings[mid].timestamp < timestamp) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }

  return low;
}

/**
 * Find the reading closest in time to a treatment.
 *
 * Readings must be sorted ascending by timestamp. A reading exactly
 * windowMs or more away is not a match. When an earlier and a later
 * reading are equally close the earlier one is returned.
 */
export function findNearestReading(
  readings: readonly GlucoseReading[],
  timestamp: number,
  windowMs: number
): GlucoseReading | null {
  if (readings.length === 0) return null;

  const index = lowerBound(readings, timestamp);
  const after = index < readings.length ? readings[index] : null;
  let before = index > 0 ? readings[index - 1] : null;

  // Several readings may share the earlier timestamp; take the first of them
  if (before) {
    let first = index - 1;
    while (first > 0 && readings[first - 1].timestamp === before.timestamp) {
      first--;
    }
    before = readings[first];
  }

  let nearest: GlucoseReading | null;
  if (before && after) {
    const beforeDiff = timestamp - before.timestamp;
    const afterDiff = after.timestamp - timestamp;
    nearest = afterDiff < beforeDiff ? after : before;
  } else {
    nearest = before ?? after;
  }

  if (!nearest || Math.abs(nearest.timestamp - timestamp) >= windowMs) {
    return null;
  }

  return nearest;
}
