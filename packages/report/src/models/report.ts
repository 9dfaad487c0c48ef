/**
 * Daily report types
 *
 * The snake_case names are the wire contract read by the report page
 * and its chart, so they are kept as-is.
 */

/** Placeholder rendered for any absent value */
export const PLACEHOLDER = "-";

export type Placeholder = typeof PLACEHOLDER;

/**
 * One table row per treatment
 */
export interface ReportRow {
  /** Local HH:MM */
  readonly time: string;
  /** CGM and/or measured glucose, e.g. "123 (+3) ↗ / measured:118" */
  readonly bg: string;
  readonly cir: number | Placeholder;
  /** Carbs with unit, e.g. "45g" */
  readonly carbs: string;
  readonly predicted: number | Placeholder;
  /** Insulin given, as entered */
  readonly actual: string;
  readonly type: string;
  /** Food items joined with ", " */
  readonly food: string;
}

/**
 * Aggregate statistics for one day
 */
export interface DailyStats {
  /** Rounded mean of all sensor values, 0 when there are none */
  averageGlucose: number;
  /** Bolus insulin units, rounded to 2 decimals */
  totalInsulin: number;
  /** Basal insulin units, rounded to 2 decimals */
  basalInsulin: number;
  /** Carbs in grams */
  totalCarbs: number;
  /** totalCarbs / totalInsulin to one decimal, or "-" */
  carbInsulinRatio: string;
}

export interface DailyReport {
  chart_times: string[];
  chart_bgs: number[];
  table_data: ReportRow[];
  avg_bg: number;
  total_insulin: number;
  basal_insulin: number;
  total_carbs: number;
  tcir: string;
}
