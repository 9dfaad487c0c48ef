/**
 * CLI configuration from the environment
 *
 * Precedence: command line flags, then the process environment, then
 * .env.local, then .env.
 */

import { join } from "path";
import { config } from "dotenv";
import {
  isLabelLanguage,
  parseUtcOffset,
  type ReportOptions,
} from "@cgm-report/core";

/**
 * Load .env.local and .env from the working directory.
 * Variables already set in the environment are not overwritten.
 */
export function loadEnvFiles(cwd: string = process.cwd()): void {
  config({ path: join(cwd, ".env.local") });
  config({ path: join(cwd, ".env") });
}

/**
 * Read report options from REPORT_* variables
 */
export function optionsFromEnv(
  env: Record<string, string | undefined> = process.env
): Partial<ReportOptions> {
  const options: Partial<ReportOptions> = {};

  if (env.REPORT_UTC_OFFSET) {
    options.utcOffsetMinutes = parseUtcOffset(env.REPORT_UTC_OFFSET);
  }

  if (env.REPORT_MATCH_WINDOW_SECONDS) {
    options.matchWindowSeconds = parseWindowSeconds(env.REPORT_MATCH_WINDOW_SECONDS);
  }

  if (env.REPORT_LABELS) {
    options.labels = parseLabels(env.REPORT_LABELS);
  }

  return options;
}

export function parseWindowSeconds(value: string): number {
  const seconds = Number(value);
  if (!/^\d+$/.test(value.trim()) || seconds <= 0) {
    throw new Error(`Invalid match window: ${value} (expected whole seconds)`);
  }
  return seconds;
}

export function parseLabels(value: string): ReportOptions["labels"] {
  if (!isLabelLanguage(value)) {
    throw new Error(`Unknown label set: ${value} (expected en or ja)`);
  }
  return value;
}
