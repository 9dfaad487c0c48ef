/**
 * @cgm-report/cli
 *
 * Command implementations, importable without starting the CLI
 */

export { loadEnvFiles, optionsFromEnv, parseLabels, parseWindowSeconds } from "./config.js";
export { readJsonFile, withinWindow, loadDayInput, type DayInput } from "./input.js";
export { formatRows, formatSummary, formatReportTable } from "./table.js";
export {
  OUTPUT_FORMATS,
  resolveCommandOptions,
  renderReport,
  runReport,
  describeNote,
  type OutputFormat,
  type ReportCommandFlags,
} from "./report-command.js";
