/**
 * Daily report assembly
 *
 * Turns one day of readings and treatments into the chart series, the
 * treatment table and the day's statistics. Pure: the same input always
 * produces the same report.
 */

import type {
  DailyReport,
  GlucoseReading,
  ReportRow,
  TreatmentEvent,
} from "../models/index.js";
import { PLACEHOLDER } from "../models/index.js";
import { LABEL_SETS, resolveReportOptions, type ReportOptions } from "../options.js";
import {
  normalizeEntries,
  normalizeTreatments,
  parseNote,
  type NightscoutEntry,
  type NightscoutTreatment,
} from "../parsers/index.js";
import {
  findNearestReading,
  formatCgmValue,
  formatGlucoseDisplay,
} from "../correlation/index.js";
import {
  createStatsAggregator,
  evaluateTreatment,
  type TreatmentContribution,
} from "../stats/index.js";
import { formatLocalTime } from "./time.js";

/**
 * Sort records ascending by timestamp; ties keep their input order
 */
export function sortByTimestamp<T extends { timestamp: number }>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => a.timestamp - b.timestamp);
}

/**
 * Chart labels and values for readings that have a value
 */
export function buildChartSeries(
  readings: readonly GlucoseReading[],
  utcOffsetMinutes: number
): { times: string[]; values: number[] } {
  const times: string[] = [];
  const values: number[] = [];

  for (const reading of readings) {
    if (reading.value === null) continue;
    times.push(formatLocalTime(reading.timestamp, utcOffsetMinutes));
    values.push(reading.value);
  }

  return { times, values };
}

/**
 * Build the table row for one treatment.
 *
 * Readings must already be sorted. The contribution is returned rather
 * than applied so the caller only counts rows that were built.
 */
export function buildReportRow(
  treatment: TreatmentEvent,
  sortedReadings: readonly GlucoseReading[],
  options: ReportOptions
): { row: ReportRow; contribution: TreatmentContribution } {
  const labels = LABEL_SETS[options.labels];

  const { note, contribution } = evaluateTreatment(
    parseNote(treatment.rawNotes, labels),
    treatment.carbsText,
    treatment.insulinText,
    labels
  );

  const nearest = findNearestReading(
    sortedReadings,
    treatment.timestamp,
    options.matchWindowSeconds * 1000
  );
  const bg = formatGlucoseDisplay(
    nearest ? formatCgmValue(nearest) : "",
    treatment.measuredGlucoseText,
    labels.measured
  );

  const row: ReportRow = {
    time: formatLocalTime(treatment.timestamp, options.utcOffsetMinutes),
    bg: bg || PLACEHOLDER,
    cir: note.ratio ?? PLACEHOLDER,
    carbs: treatment.carbsText ? `${treatment.carbsText}g` : PLACEHOLDER,
    predicted: note.predictedInsulin ?? PLACEHOLDER,
    actual: treatment.insulinText ?? PLACEHOLDER,
    type: note.insulinType ?? PLACEHOLDER,
    food: note.foodItems.length > 0 ? note.foodItems.join(", ") : PLACEHOLDER,
  };

  return { row, contribution };
}

/**
 * Assemble the report from normalized readings and treatments
 */
export function assembleReport(
  readings: readonly GlucoseReading[],
  treatments: readonly TreatmentEvent[],
  overrides: Partial<ReportOptions> = {}
): DailyReport {
  const options = resolveReportOptions(overrides);
  const sortedReadings = sortByTimestamp(readings);
  const sortedTreatments = sortByTimestamp(treatments);

  const chart = buildChartSeries(sortedReadings, options.utcOffsetMinutes);
  const stats = createStatsAggregator();
  const rows: ReportRow[] = [];

  for (const treatment of sortedTreatments) {
    try {
      const { row, contribution } = buildReportRow(treatment, sortedReadings, options);
      rows.push(row);
      stats.add(contribution);
    } catch (error) {
      console.error(
        `Skipping treatment at ${new Date(treatment.timestamp).toISOString()}:`,
        error
      );
    }
  }

  const daily = stats.finalize(sortedReadings);

  return {
    chart_times: chart.times,
    chart_bgs: chart.values,
    table_data: rows,
    avg_bg: daily.averageGlucose,
    total_insulin: daily.totalInsulin,
    basal_insulin: daily.basalInsulin,
    total_carbs: daily.totalCarbs,
    tcir: daily.carbInsulinRatio,
  };
}

/**
 * Build the report from raw Nightscout entries and treatments.
 * Records with an unparseable timestamp are skipped.
 */
export function buildDailyReport(
  entries: readonly NightscoutEntry[],
  treatments: readonly NightscoutTreatment[],
  overrides: Partial<ReportOptions> = {}
): DailyReport {
  const readings = normalizeEntries(entries);
  const events = normalizeTreatments(treatments);

  if (readings.skipped > 0) {
    console.warn(`Skipped ${readings.skipped} entries with an unparseable dateString`);
  }
  if (events.skipped > 0) {
    console.warn(`Skipped ${events.skipped} treatments with an unparseable created_at`);
  }

  return assembleReport(readings.records, events.records, overrides);
}
