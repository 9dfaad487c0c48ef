/**
 * @cgm-report/core - Report
 */

export {
  sortByTimestamp,
  buildChartSeries,
  buildReportRow,
  assembleReport,
  buildDailyReport,
} from "./assembler.js";

export {
  formatLocalTime,
  formatLocalDate,
  localDayWindow,
  parseUtcOffset,
} from "./time.js";
