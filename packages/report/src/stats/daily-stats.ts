/**
 * Daily carb and insulin statistics
 */

import type { DailyStats, GlucoseReading, ParsedNote } from "../models/index.js";
import { PLACEHOLDER } from "../models/index.js";
import { SNACK_LABELS, type LabelSet } from "../options.js";
import { parseDecimal } from "../parsers/index.js";
import { formatHalfEven, roundHalfEven } from "./rounding.js";

/**
 * Carb entries in this range (grams, inclusive) are small snacks
 */
export const SNACK_CARBS = {
  MIN: 1,
  MAX: 3,
} as const;

/**
 * How a treatment's insulin counts toward the day.
 * A treatment is exactly one of these.
 */
export type InsulinClassification =
  | { kind: "basal"; units: number }
  | { kind: "bolus"; units: number }
  | { kind: "none" };

/**
 * What one treatment adds to the daily totals
 */
export interface TreatmentContribution {
  carbs: number | null;
  insulin: InsulinClassification;
}

function mentionsSnack(foodItems: readonly string[]): boolean {
  return foodItems.some((item) => {
    const lower = item.toLowerCase();
    return SNACK_LABELS.some((label) => lower.includes(label.toLowerCase()));
  });
}

/**
 * Mark a small carb entry as a snack.
 *
 * Prepends the snack label when carbs are within SNACK_CARBS and no food
 * item already mentions a snack. Returns the note unchanged otherwise.
 */
export function applySnackRule(
  note: ParsedNote,
  carbs: number | null,
  labels: LabelSet
): ParsedNote {
  if (carbs === null || carbs < SNACK_CARBS.MIN || carbs > SNACK_CARBS.MAX) {
    return note;
  }
  if (mentionsSnack(note.foodItems)) {
    return note;
  }
  return { ...note, foodItems: [labels.snack, ...note.foodItems] };
}

/**
 * Basal when the note is a basal record with a non-zero amount,
 * otherwise bolus when the insulin field parses
 */
export function classifyInsulin(
  note: ParsedNote,
  insulinText: string | null,
  labels: LabelSet
): InsulinClassification {
  if (note.basalAmount && note.foodItems.includes(labels.basal)) {
    return { kind: "basal", units: note.basalAmount };
  }

  const units = parseDecimal(insulinText);
  return units === null ? { kind: "none" } : { kind: "bolus", units };
}

/**
 * Apply the snack rule and work out the treatment's contribution
 */
export function evaluateTreatment(
  note: ParsedNote,
  carbsText: string | null,
  insulinText: string | null,
  labels: LabelSet
): { note: ParsedNote; contribution: TreatmentContribution } {
  const carbs = parseDecimal(carbsText);
  const finalNote = applySnackRule(note, carbs, labels);

  return {
    note: finalNote,
    contribution: {
      carbs,
      insulin: classifyInsulin(finalNote, insulinText, labels),
    },
  };
}

/**
 * Rounded mean of the readings' values, 0 when none have a value
 */
export function averageGlucose(readings: readonly GlucoseReading[]): number {
  const values = readings
    .map((r) => r.value)
    .filter((v): v is number => v !== null);

  if (values.length === 0) return 0;

  const sum = values.reduce((a, b) => a + b, 0);
  return roundHalfEven(sum / values.length);
}

/**
 * Total carbs per unit of bolus insulin, one decimal place, or "-"
 */
export function formatCarbInsulinRatio(totalCarbs: number, totalInsulin: number): string {
  return totalInsulin > 0 ? formatHalfEven(totalCarbs / totalInsulin, 1) : PLACEHOLDER;
}

/**
 * Create an accumulator for one report run
 */
export function createStatsAggregator() {
  let totalCarbs = 0;
  let totalInsulin = 0;
  let basalInsulin = 0;

  return {
    /** Add a treatment's contribution */
    add: (contribution: TreatmentContribution): void => {
      if (contribution.carbs !== null) {
        totalCarbs += contribution.carbs;
      }

      const { insulin } = contribution;
      if (insulin.kind === "basal") {
        basalInsulin += insulin.units;
      } else if (insulin.kind === "bolus") {
        totalInsulin += insulin.units;
      }
    },

    /** Compute the final statistics; the ratio uses unrounded totals */
    finalize: (readings: readonly GlucoseReading[]): DailyStats => ({
      averageGlucose: averageGlucose(readings),
      totalInsulin: roundHalfEven(totalInsulin, 2),
      basalInsulin: roundHalfEven(basalInsulin, 2),
      totalCarbs,
      carbInsulinRatio: formatCarbInsulinRatio(totalCarbs, totalInsulin),
    }),
  };
}

export type StatsAggregator = ReturnType<typeof createStatsAggregator>;
