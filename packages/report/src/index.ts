/**
 * @cgm-report/core
 *
 * Daily report pipeline for Nightscout CGM entries and treatments
 *
 * @example
 * ```typescript
 * import { buildDailyReport, readNightscoutEntries, readNightscoutTreatments } from "@cgm-report/core";
 *
 * const report = buildDailyReport(
 *   readNightscoutEntries(entriesJson),
 *   readNightscoutTreatments(treatmentsJson),
 *   { utcOffsetMinutes: 540 }
 * );
 * ```
 */

// Models - Type definitions
export * from "./models/index.js";

// Options - Offsets, match window, label sets
export * from "./options.js";

// Parsers - Note grammar and feed normalization
export * from "./parsers/index.js";

// Correlation - Nearest CGM reading and glucose column
export * from "./correlation/index.js";

// Statistics - Daily totals
export * from "./stats/index.js";

// Report - Assembly and local time
export * from "./report/index.js";
