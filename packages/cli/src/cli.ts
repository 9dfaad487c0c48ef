#!/usr/bin/env node
/**
 * CGM Report CLI
 *
 * Usage:
 *   npm run report -- report --entries entries.json --treatments treatments.json --date 2024-05-01
 *   npm run report -- note "cir 300 4.5N" "rice"
 */

import { writeFileSync } from "fs";
import { Command, program } from "commander";
import { loadEnvFiles, optionsFromEnv, parseLabels } from "./config.js";
import { describeNote, runReport, type ReportCommandFlags } from "./report-command.js";

loadEnvFiles();

program
  .name("cgm-report")
  .description("Build daily reports from exported Nightscout entries and treatments")
  .version("0.1.0");

program
  .command("report")
  .description("Build the report for one day")
  .requiredOption("--entries <file>", "Nightscout entries JSON export")
  .requiredOption("--treatments <file>", "Nightscout treatments JSON export")
  .option("--date <YYYY-MM-DD>", "Only include records from this local day")
  .option("--utc-offset <offset>", "Local UTC offset, e.g. +09:00")
  .option("--window <seconds>", "Maximum distance between a treatment and its reading")
  .option("--labels <lang>", "Label language: en or ja")
  .option("--format <format>", "Output format: json or table", "json")
  .option("--out <file>", "Write the report to a file instead of stdout")
  .action((_options: unknown, command: Command) => {
    const flags = command.opts<ReportCommandFlags & { out?: string }>();

    try {
      const output = runReport(flags);

      if (flags.out) {
        writeFileSync(flags.out, output + "\n");
        console.log(`Report written to ${flags.out}`);
      } else {
        console.log(output);
      }
    } catch (error) {
      console.error("Report failed:", error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program
  .command("note")
  .description("Show how a treatment note is parsed (one argument per line)")
  .argument("<lines...>", "Note lines")
  .option("--labels <lang>", "Label language: en or ja")
  .action((lines: string[], _options: unknown, command: Command) => {
    const { labels } = command.opts<{ labels?: string }>();

    try {
      const language = labels !== undefined ? parseLabels(labels) : optionsFromEnv().labels;
      console.log(describeNote(lines.join("\n"), language));
    } catch (error) {
      console.error("Note failed:", error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });

program.parse();
