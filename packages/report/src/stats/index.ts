/**
 * @cgm-report/core - Statistics
 */

export {
  SNACK_CARBS,
  applySnackRule,
  classifyInsulin,
  evaluateTreatment,
  averageGlucose,
  formatCarbInsulinRatio,
  createStatsAggregator,
  type InsulinClassification,
  type TreatmentContribution,
  type StatsAggregator,
} from "./daily-stats.js";
export { roundHalfEven, formatHalfEven } from "./rounding.js";
