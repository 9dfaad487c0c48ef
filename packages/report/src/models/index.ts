/**
 * @cgm-report/core - Models
 */

export * from "./reading.js";
export * from "./treatment.js";
export * from "./note.js";
export * from "./report.js";
