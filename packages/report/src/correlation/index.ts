/**
 * @cgm-report/core - Correlation
 *
 * Matching treatments to CGM readings and formatting the glucose column
 */

export { findNearestReading } from "./nearest-reading.js";

export {
  trendArrow,
  formatDelta,
  formatCgmValue,
  formatGlucoseDisplay,
} from "./glucose-display.js";
