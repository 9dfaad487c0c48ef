/**
 * Report options and label sets
 */

/**
 * Text the pipeline writes into rows and matches in food items
 */
export interface LabelSet {
  /** Food item marking a basal injection note */
  basal: string;
  /** Food item for a glucose-tablet ("B") note */
  glucoseSnack: string;
  /** Food item inserted for small carb entries; also matched as a substring */
  snack: string;
  /** Prefix for a manual glucose check in the bg column */
  measured: string;
}

export const LABEL_SETS = {
  en: {
    basal: "basal insulin",
    glucoseSnack: "glucose snack",
    snack: "snack",
    measured: "measured",
  },
  ja: {
    basal: "基礎インスリン",
    glucoseSnack: "ぶどう糖補食",
    snack: "補食",
    measured: "実測",
  },
} as const satisfies Record<string, LabelSet>;

export type LabelLanguage = keyof typeof LABEL_SETS;

export interface ReportOptions {
  /** Offset of the report's local time from UTC, in minutes */
  utcOffsetMinutes: number;
  /** Readings this far or further from a treatment are not matched */
  matchWindowSeconds: number;
  labels: LabelLanguage;
}

export const DEFAULT_REPORT_OPTIONS: ReportOptions = {
  utcOffsetMinutes: 9 * 60,
  matchWindowSeconds: 900,
  labels: "en",
};

/** Widest offset in use anywhere (UTC+14:00) */
const MAX_OFFSET_MINUTES = 14 * 60;

export function isLabelLanguage(value: string): value is LabelLanguage {
  return Object.prototype.hasOwnProperty.call(LABEL_SETS, value);
}

/**
 * Merge partial options over the defaults and validate them
 */
export function resolveReportOptions(
  overrides: Partial<ReportOptions> = {}
): ReportOptions {
  const options = { ...DEFAULT_REPORT_OPTIONS, ...overrides };

  if (
    !Number.isInteger(options.utcOffsetMinutes) ||
    Math.abs(options.utcOffsetMinutes) > MAX_OFFSET_MINUTES
  ) {
    throw new Error(
      `Invalid UTC offset: ${options.utcOffsetMinutes} minutes (expected a whole number within ±${MAX_OFFSET_MINUTES})`
    );
  }

  if (!Number.isFinite(options.matchWindowSeconds) || options.matchWindowSeconds <= 0) {
    throw new Error(
      `Invalid match window: ${options.matchWindowSeconds} seconds (expected a positive number)`
    );
  }

  if (!isLabelLanguage(options.labels)) {
    throw new Error(`Unknown label set: ${String(options.labels)}`);
  }

  return options;
}

/** Snack labels of every set, matched regardless of the active set */
export const SNACK_LABELS: readonly string[] = Object.values(LABEL_SETS).map(
  (set) => set.snack
);
