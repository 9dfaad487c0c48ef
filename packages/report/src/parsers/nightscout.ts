/**
 * Nightscout feed records
 *
 * Raw entries and treatments arrive as deserialized JSON from the
 * Nightscout API (/api/v1/entries.json and /api/v1/treatments.json).
 * Only the fields the report reads are kept.
 */

import type { GlucoseReading, TreatmentEvent } from "../models/index.js";
import { parseIsoTimestamp, toFieldText, toOptionalNumber } from "./numbers.js";

/**
 * Sensor glucose entry as sent by Nightscout
 */
export interface NightscoutEntry {
  /** ISO-8601 timestamp */
  dateString?: string;
  /** Sensor glucose value (mg/dL) */
  sgv?: number;
  direction?: string;
  delta?: number;
}

/**
 * Treatment as sent by Nightscout. Careportal and most uploaders send the
 * numeric fields as numbers; some send text.
 */
export interface NightscoutTreatment {
  created_at?: string;
  notes?: string;
  carbs?: string | number;
  insulin?: string | number;
  glucose?: string | number;
}

export interface Normalized<T> {
  records: T[];
  /** Records dropped for an unparseable timestamp */
  skipped: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function optionalNumeric(value: unknown): string | number | undefined {
  return typeof value === "string" || typeof value === "number" ? value : undefined;
}

function optionalNumber(value: unknown): number | undefined {
  return toOptionalNumber(value) ?? undefined;
}

/**
 * Read a deserialized entries.json body.
 * Non-object items become empty entries, which normalize as skipped.
 */
export function readNightscoutEntries(body: unknown): NightscoutEntry[] {
  if (!Array.isArray(body)) {
    throw new Error("Expected entries to be a JSON array");
  }

  return body.map((item): NightscoutEntry => {
    if (!isRecord(item)) return {};
    return {
      dateString: optionalString(item.dateString),
      sgv: optionalNumber(item.sgv),
      direction: optionalString(item.direction),
      delta: optionalNumber(item.delta),
    };
  });
}

/**
 * Read a deserialized treatments.json body
 */
export function readNightscoutTreatments(body: unknown): NightscoutTreatment[] {
  if (!Array.isArray(body)) {
    throw new Error("Expected treatments to be a JSON array");
  }

  return body.map((item): NightscoutTreatment => {
    if (!isRecord(item)) return {};
    return {
      created_at: optionalString(item.created_at),
      notes: optionalString(item.notes),
      carbs: optionalNumeric(item.carbs),
      insulin: optionalNumeric(item.insulin),
      glucose: optionalNumeric(item.glucose),
    };
  });
}

/**
 * Convert an entry to a reading, or null when its timestamp is unusable
 */
export function toGlucoseReading(entry: NightscoutEntry): GlucoseReading | null {
  const timestamp = parseIsoTimestamp(entry.dateString);
  if (timestamp === null) return null;

  return {
    timestamp,
    value: toOptionalNumber(entry.sgv),
    trendDirection: entry.direction ? entry.direction : null,
    delta: toOptionalNumber(entry.delta),
  };
}

/**
 * Convert a treatment to an event, or null when its timestamp is unusable
 */
export function toTreatmentEvent(treatment: NightscoutTreatment): TreatmentEvent | null {
  const timestamp = parseIsoTimestamp(treatment.created_at);
  if (timestamp === null) return null;

  return {
    timestamp,
    rawNotes: treatment.notes ? treatment.notes : null,
    carbsText: toFieldText(treatment.carbs),
    insulinText: toFieldText(treatment.insulin),
    measuredGlucoseText: toFieldText(treatment.glucose),
  };
}

function normalize<R, T>(raw: readonly R[], convert: (item: R) => T | null): Normalized<T> {
  const records: T[] = [];
  let skipped = 0;

  for (const item of raw) {
    const record = convert(item);
    if (record !== null) {
      records.push(record);
    } else {
      skipped++;
    }
  }

  return { records, skipped };
}

export function normalizeEntries(entries: readonly NightscoutEntry[]): Normalized<GlucoseReading> {
  return normalize(entries, toGlucoseReading);
}

export function normalizeTreatments(
  treatments: readonly NightscoutTreatment[]
): Normalized<TreatmentEvent> {
  return normalize(treatments, toTreatmentEvent);
}
