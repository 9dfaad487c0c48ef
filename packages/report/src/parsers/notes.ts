/**
 * Treatment note parser
 *
 * Notes follow an informal notation where the first non-empty line decides
 * what the note is:
 *
 * - `Tore 8` / `トレ 8`     basal injection of 8 units
 * - `B`                      glucose tablet snack
 * - `N` / `F`                insulin type only (normal / fast)
 * - `cir 300 4.5N`          carb ratio 300, predicted 4.5 units, type N
 * - anything else            food only
 *
 * Every line after the first is a food item. In the fallback case the
 * first line is a food item too.
 */

import type { InsulinType, ParsedNote } from "../models/index.js";
import { EMPTY_NOTE } from "../models/index.js";
import { LABEL_SETS, type LabelSet } from "../options.js";
import { parseDecimal } from "./numbers.js";

const BASAL_PREFIX = /^(?:Tore|トレ)\s/;
const CIR_TOKEN = /cir/gi;

/**
 * Split note text into trimmed, non-empty lines
 */
export function splitNoteLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "");
}

function toInsulinType(value: string): InsulinType | null {
  const upper = value.toUpperCase();
  return upper === "N" || upper === "F" ? upper : null;
}

/**
 * Parse the "<ratio> <predicted>[N|F]" first line.
 * Returns null when the line does not start with a number.
 */
function parseRatioLine(
  line: string
): Pick<ParsedNote, "ratio" | "predictedInsulin" | "insulinType"> | null {
  const tokens = line.replace(CIR_TOKEN, "").trim().split(/\s+/);
  const ratio = parseDecimal(tokens[0]);
  if (ratio === null) return null;

  const second = tokens[1];
  if (second === undefined) {
    return { ratio, predictedInsulin: null, insulinType: null };
  }

  const insulinType = toInsulinType(second.slice(-1));
  const insulinText = insulinType ? second.slice(0, -1) : second;

  return {
    ratio,
    predictedInsulin: parseDecimal(insulinText),
    insulinType,
  };
}

/**
 * Parse a treatment note into its structured form
 */
export function parseNote(
  text: string | null | undefined,
  labels: LabelSet = LABEL_SETS.en
): ParsedNote {
  if (!text) return EMPTY_NOTE;

  const lines = splitNoteLines(text);
  if (lines.length === 0) return EMPTY_NOTE;

  const [first, ...rest] = lines;

  if (BASAL_PREFIX.test(first)) {
    const amountToken = first.split(/\s+/)[1];
    return {
      ...EMPTY_NOTE,
      basalAmount: parseDecimal(amountToken),
      foodItems: [labels.basal, ...rest],
    };
  }

  if (first.toUpperCase() === "B") {
    return { ...EMPTY_NOTE, foodItems: [labels.glucoseSnack, ...rest] };
  }

  const typeOnly = toInsulinType(first);
  if (typeOnly) {
    return { ...EMPTY_NOTE, insulinType: typeOnly, foodItems: rest };
  }

  const ratioLine = parseRatioLine(first);
  if (ratioLine) {
    return { ...EMPTY_NOTE, ...ratioLine, foodItems: rest };
  }

  return { ...EMPTY_NOTE, foodItems: lines };
}
