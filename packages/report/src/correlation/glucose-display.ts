/**
 * Glucose column text for report rows
 */

import type { GlucoseReading, TrendDirection } from "../models/index.js";
import { isTrendDirection } from "../models/index.js";
import { roundHalfEven } from "../stats/rounding.js";

/** Nightscout direction code → arrow */
const DIRECTION_ARROWS: Record<TrendDirection, string> = {
  DoubleUp: "⇈",
  SingleUp: "↑",
  FortyFiveUp: "↗",
  Flat: "→",
  FortyFiveDown: "↘",
  SingleDown: "↓",
  DoubleDown: "⇊",
  "NOT COMPUTABLE": "?",
  "RATE OUT OF RANGE": "?",
};

/**
 * Arrow for a trend direction, or "" for unknown or missing codes
 */
export function trendArrow(direction: string | null): string {
  return direction && isTrendDirection(direction) ? DIRECTION_ARROWS[direction] : "";
}

/**
 * Rounded delta with an explicit sign when positive, e.g. "+3", "-2", "0".
 * Halves round to even: 2.5 gives "+2".
 */
export function formatDelta(delta: number): string {
  const rounded = roundHalfEven(delta);
  return rounded > 0 ? `+${rounded}` : String(rounded);
}

/**
 * Sensor part of the glucose column: "<value>[ (<delta>)][ <arrow>]".
 * Empty when the reading has no value (or a zero value).
 */
export function formatCgmValue(reading: GlucoseReading): string {
  if (!reading.value) return "";

  let display = String(reading.value);

  if (reading.delta !== null && reading.delta !== 0) {
    display += ` (${formatDelta(reading.delta)})`;
  }

  const arrow = trendArrow(reading.trendDirection);
  if (arrow) {
    display += ` ${arrow}`;
  }

  return display;
}

/**
 * Combine the sensor text and a manual glucose check.
 * Returns "" when neither is available.
 */
export function formatGlucoseDisplay(
  cgmText: string,
  measuredGlucoseText: string | null,
  measuredLabel: string
): string {
  if (!measuredGlucoseText) return cgmText;

  const measured = `${measuredLabel}:${measuredGlucoseText}`;
  return cgmText ? `${cgmText} / ${measured}` : measured;
}
