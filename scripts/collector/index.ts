#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";

import { loadSettings } from "./config";
import { describeError } from "./errors";
import { buildReportFromFiles, runInventory } from "./pipeline";
import { createSource } from "./sources";
import { summaryTable, type SummarySection } from "./summary";
import { toOwnedRow, toStarredRow } from "../report/csv";

const program = new Command();

function parsePositiveInteger(flag: string) {
  return (value: string) => {
    const parsed = Number.parseInt(value, 10);
    if (!/^\d+$/.test(value) || parsed <= 0) {
      throw new Error(`${flag} must be a positive integer`);
    }
    return parsed;
  };
}

program
  .name("repo-inventory")
  .description("Inventory the repositories a GitHub account owns and stars into CSV files and a Markdown report")
  .option("-u, --user <login>", "GitHub account to inventory (default: GITHUB_USERNAME)")
  .option("--output-base <dir>", "Base directory for per-account output (default: OUTPUT_BASE or docs)")
  .option("--owned-csv <path>", "Path of the owned repositories CSV")
  .option("--starred-csv <path>", "Path of the starred repositories CSV")
  .option("--report-md <path>", "Path of the Markdown report")
  .option("--source <kind>", "Where to read repository data from: cli (gh) or api (REST, needs GITHUB_TOKEN)")
  .option("--limit <number>", "Collect at most this many repositories per listing", parsePositiveInteger("--limit"))
  .option("--owned-only", "Only inventory owned repositories")
  .option("--starred-only", "Only inventory starred repositories")
  .option("--report-only", "Rebuild the report from existing CSV files without collecting")
  .option("--no-report", "Write the CSV files but skip the report")
  .option("--concurrency <number>", "Branch lookups to run in parallel (default: 1)")
  .option("--timeout <ms>", "Timeout for each branch lookup in milliseconds")
  .option("--debug", "Log every external call")
  .parse(process.argv);

async function run() {
  const options = program.opts<{
    user?: string;
    outputBase?: string;
    ownedCsv?: string;
    starredCsv?: string;
    reportMd?: string;
    source?: string;
    limit?: number;
    ownedOnly?: boolean;
    starredOnly?: boolean;
    reportOnly?: boolean;
    report: boolean;
    concurrency?: string;
    timeout?: string;
    debug?: boolean;
  }>();

  const settings = loadSettings({
    username: options.user,
    outputBase: options.outputBase,
    ownedCsv: options.ownedCsv,
    starredCsv: options.starredCsv,
    reportMd: options.reportMd,
    source: options.source,
    concurrency: options.concurrency,
    timeoutMs: options.timeout,
    debug: options.debug,
  });

  if (settings.debug) {
    console.log("ℹ️  Debug mode enabled");
  }

  if (options.reportOnly) {
    const report = await buildReportFromFiles(settings, {
      ownedOnly: options.ownedOnly,
      starredOnly: options.starredOnly,
      limitApplied: options.limit ?? null,
    });
    console.log(
      summaryTable([
        { label: "Owned", rows: report.ownedRows },
        { label: "Starred", rows: report.starredRows },
      ])
    );
    return;
  }

  const source = createSource(settings);
  console.log(`ℹ️  Inventorying ${settings.username} through the ${source.kind} source`);

  const result = await runInventory(settings, source, {
    ownedOnly: options.ownedOnly,
    starredOnly: options.starredOnly,
    skipReport: !options.report,
    limit: options.limit,
  });

  if (result.empty) {
    console.log(`⚠️  No repositories found for ${settings.username}; nothing was written`);
    return;
  }

  const sections: SummarySection[] = [];
  if (result.owned) {
    sections.push({ label: "Owned", rows: result.owned.records.map(toOwnedRow) });
  }
  if (result.starred) {
    sections.push({ label: "Starred", rows: result.starred.records.map(toStarredRow) });
  }

  console.log("\n✅ Inventory complete:");
  console.log(summaryTable(sections));
  for (const file of result.files) {
    console.log(`  • ${file}`);
  }
}

run().catch((error) => {
  console.error("\n❌ Inventory failed:", describeError(error));
  process.exit(1);
});
