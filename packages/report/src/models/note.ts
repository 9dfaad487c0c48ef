/**
 * Structured form of a treatment's free-text note
 */

/**
 * Insulin type letter written in notes: N (normal) or F (fast).
 * null means unspecified.
 */
export type InsulinType = "N" | "F";

export interface ParsedNote {
  /** Carb-to-insulin ratio planned for this meal */
  readonly ratio: number | null;
  /** Insulin units the ratio predicted */
  readonly predictedInsulin: number | null;
  readonly insulinType: InsulinType | null;
  /** Food lines, in order, including synthetic marker items */
  readonly foodItems: readonly string[];
  /** Units of a basal injection */
  readonly basalAmount: number | null;
}

export const EMPTY_NOTE: ParsedNote = {
  ratio: null,
  predictedInsulin: null,
  insulinType: null,
  foodItems: [],
  basalAmount: null,
};
