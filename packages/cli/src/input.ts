/**
 * Reading exported Nightscout JSON files
 */

import { readFileSync } from "fs";
import {
  parseIsoTimestamp,
  readNightscoutEntries,
  readNightscoutTreatments,
  type NightscoutEntry,
  type NightscoutTreatment,
} from "@cgm-report/core";

export interface DayInput {
  entries: NightscoutEntry[];
  treatments: NightscoutTreatment[];
}

/**
 * Read and parse a JSON file
 */
export function readJsonFile(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read ${path}: ${reason}`);
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${path}: ${reason}`);
  }
}

/**
 * Keep records inside [start, end).
 * Records whose timestamp does not parse are kept so the report counts them as skipped.
 */
export function withinWindow<T>(
  records: readonly T[],
  timestampOf: (record: T) => string | undefined,
  window: { start: number; end: number }
): T[] {
  return records.filter((record) => {
    const timestamp = parseIsoTimestamp(timestampOf(record));
    return timestamp === null || (timestamp >= window.start && timestamp < window.end);
  });
}

/**
 * Load entries and treatments, optionally restricted to one local day
 */
export function loadDayInput(
  entriesPath: string,
  treatmentsPath: string,
  window?: { start: number; end: number }
): DayInput {
  const entries = readNightscoutEntries(readJsonFile(entriesPath));
  const treatments = readNightscoutTreatments(readJsonFile(treatmentsPath));

  if (!window) {
    return { entries, treatments };
  }

  return {
    entries: withinWindow(entries, (e) => e.dateString, window),
    treatments: withinWindow(treatments, (t) => t.created_at, window),
  };
}
