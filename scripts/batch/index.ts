#!/usr/bin/env node
import { Command } from "commander";
import "dotenv/config";

import { loadSharedSettings, parseAccountArgument, readBatchConfig } from "../collector/config";
import { ConfigurationError, describeError } from "../collector/errors";
import { createSource } from "../collector/sources";
import type { RunConfig } from "../collector/types";
import { batchTable, runBatch } from "./run";

const program = new Command();

program
  .name("repo-inventory-batch")
  .description("Run the repository inventory for several GitHub accounts, one output directory each")
  .option("-i, --input <path>", "JSON file with an array of { account, limit? } entries (or { configs: [...] })")
  .option(
    "-a, --account <name[:limit]>",
    "Account to include, optionally with a collection limit (can be repeated)",
    (value, previous: string[] = []) => {
      previous.push(value);
      return previous;
    }
  )
  .option("-o, --output <dir>", "Base directory for the per-account output (default: OUTPUT_BASE or docs)")
  .option("--source <kind>", "Where to read repository data from: cli (gh) or api (REST, needs GITHUB_TOKEN)")
  .option(
    "--concurrency <number>",
    "Number of accounts to process in parallel",
    (value) => {
      const parsed = Number.parseInt(value, 10);
      if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new Error("--concurrency must be a positive integer");
      }
      return parsed;
    },
    1
  )
  .option("--debug", "Log every external call")
  .parse(process.argv);

async function readRunConfigs(inputPath: string | undefined, accounts: string[] | undefined): Promise<RunConfig[]> {
  const configs: RunConfig[] = [];
  if (inputPath) {
    configs.push(...(await readBatchConfig(inputPath)));
  }
  if (accounts) {
    configs.push(...accounts.map(parseAccountArgument));
  }
  if (configs.length === 0) {
    throw new ConfigurationError("No accounts specified. Use --input or --account.");
  }
  return configs;
}

async function run() {
  const options = program.opts<{
    input?: string;
    account?: string[];
    output?: string;
    source?: string;
    concurrency: number;
    debug?: boolean;
  }>();

  const settings = loadSharedSettings({ outputBase: options.output, source: options.source, debug: options.debug });
  const configs = await readRunConfigs(options.input, options.account);

  console.log(`ℹ️  Processing ${configs.length} account(s) into ${settings.outputBase} (concurrency ${options.concurrency})`);

  const summary = await runBatch(configs, {
    baseDir: settings.outputBase,
    settings,
    source: createSource(settings),
    concurrency: options.concurrency,
  });

  console.log(`\n${summary.failed === 0 ? "✅" : "⚠️ "} Batch complete: ${summary.succeeded} succeeded, ${summary.failed} failed`);
  console.log(batchTable(summary));

  if (summary.failed > 0) {
    process.exitCode = 1;
  }
}

run().catch((error) => {
  console.error("\n❌ Batch failed:", describeError(error));
  process.exit(1);
});
