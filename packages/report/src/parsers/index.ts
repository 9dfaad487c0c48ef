/**
 * @cgm-report/core - Parsers
 *
 * Note grammar and Nightscout feed normalization
 */

export { parseNote, splitNoteLines } from "./notes.js";

export {
  parseDecimal,
  parseIsoTimestamp,
  toFieldText,
  toOptionalNumber,
} from "./numbers.js";

export {
  readNightscoutEntries,
  readNightscoutTreatments,
  toGlucoseReading,
  toTreatmentEvent,
  normalizeEntries,
  normalizeTreatments,
  type NightscoutEntry,
  type NightscoutTreatment,
  type Normalized,
} from "./nightscout.js";
