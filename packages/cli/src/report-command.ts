/**
 * The report command: files in, rendered report out
 */

import {
  buildDailyReport,
  localDayWindow,
  parseNote,
  parseUtcOffset,
  resolveReportOptions,
  LABEL_SETS,
  type DailyReport,
  type ReportOptions,
} from "@cgm-report/core";
import { optionsFromEnv, parseLabels, parseWindowSeconds } from "./config.js";
import { loadDayInput } from "./input.js";
import { formatReportTable } from "./table.js";

export const OUTPUT_FORMATS = ["json", "table"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

/**
 * Flags of the report command, as commander hands them over
 */
export type ReportCommandFlags = {
  entries: string;
  treatments: string;
  date?: string;
  utcOffset?: string;
  window?: string;
  labels?: string;
  format?: string;
};

function parseFormat(value: string): OutputFormat {
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new Error(`Unknown format: ${value} (expected ${OUTPUT_FORMATS.join(" or ")})`);
  }
  return format;
}

/**
 * Merge environment settings and flags into report options
 */
export function resolveCommandOptions(
  flags: Omit<ReportCommandFlags, "entries" | "treatments">,
  env: Record<string, string | undefined> = process.env
): ReportOptions {
  const overrides: Partial<ReportOptions> = optionsFromEnv(env);

  if (flags.utcOffset !== undefined) {
    overrides.utcOffsetMinutes = parseUtcOffset(flags.utcOffset);
  }
  if (flags.window !== undefined) {
    overrides.matchWindowSeconds = parseWindowSeconds(flags.window);
  }
  if (flags.labels !== undefined) {
    overrides.labels = parseLabels(flags.labels);
  }

  return resolveReportOptions(overrides);
}

export function renderReport(report: DailyReport, format: OutputFormat): string {
  return format === "json" ? JSON.stringify(report, null, 2) : formatReportTable(report);
}

/**
 * Build and render a report from the files named in the flags
 */
export function runReport(
  flags: ReportCommandFlags,
  env: Record<string, string | undefined> = process.env
): string {
  const options = resolveCommandOptions(flags, env);
  const format = parseFormat(flags.format ?? "json");
  const window = flags.date
    ? localDayWindow(flags.date, options.utcOffsetMinutes)
    : undefined;

  const { entries, treatments } = loadDayInput(flags.entries, flags.treatments, window);
  const report = buildDailyReport(entries, treatments, options);

  return renderReport(report, format);
}

/**
 * Describe how a note parses, one field per line
 */
export function describeNote(text: string, labels: ReportOptions["labels"] = "en"): string {
  const note = parseNote(text, LABEL_SETS[labels]);
  const show = (value: number | string | null) => (value === null ? "-" : String(value));

  return [
    `ratio:     ${show(note.ratio)}`,
    `predicted: ${show(note.predictedInsulin)}`,
    `type:      ${show(note.insulinType)}`,
    `basal:     ${show(note.basalAmount)}`,
    `food:      ${note.foodItems.length > 0 ? note.foodItems.join(", ") : "-"}`,
  ].join("\n");
}
