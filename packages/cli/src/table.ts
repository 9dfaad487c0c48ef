/**
 * Plain text rendering of a daily report
 */

import type { DailyReport, ReportRow } from "@cgm-report/core";

const COLUMNS: Array<{ title: string; value: (row: ReportRow) => string }> = [
  { title: "Time", value: (row) => row.time },
  { title: "BG", value: (row) => row.bg },
  { title: "CIR", value: (row) => String(row.cir) },
  { title: "Carbs", value: (row) => row.carbs },
  { title: "Predicted", value: (row) => String(row.predicted) },
  { title: "Actual", value: (row) => row.actual },
  { title: "Type", value: (row) => row.type },
  { title: "Food", value: (row) => row.food },
];

/**
 * Render rows as aligned columns separated by two spaces
 */
export function formatRows(rows: readonly ReportRow[]): string[] {
  const cells = [
    COLUMNS.map((c) => c.title),
    ...rows.map((row) => COLUMNS.map((c) => c.value(row))),
  ];

  const widths = COLUMNS.map((_, i) => Math.max(...cells.map((line) => line[i].length)));

  return cells.map((line) =>
    line
      .map((cell, i) => (i === line.length - 1 ? cell : cell.padEnd(widths[i])))
      .join("  ")
  );
}

/**
 * Summary lines for the day's statistics
 */
export function formatSummary(report: DailyReport): string[] {
  return [
    `Average BG: ${report.avg_bg} mg/dL`,
    `Bolus insulin: ${report.total_insulin}U`,
    `Basal insulin: ${report.basal_insulin}U`,
    `Carbs: ${report.total_carbs}g`,
    `TCIR: ${report.tcir}`,
  ];
}

export function formatReportTable(report: DailyReport): string {
  const lines = report.table_data.length > 0 ? formatRows(report.table_data) : ["No treatments"];
  return [...lines, "", ...formatSummary(report)].join("\n");
}
