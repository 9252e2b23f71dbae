import Table from "cli-table3";
import path from "node:path";

import { accountDirectoryName, outputPathsFor, type InventorySettings, type SharedSettings } from "../collector/config";
import { describeError } from "../collector/errors";
import { runInventory } from "../collector/pipeline";
import type { RepositorySource } from "../collector/sources/source";
import type { RunConfig } from "../collector/types";

export interface BatchOptions {
  /** Each account writes into `<baseDir>/<account>/`. */
  baseDir: string;
  settings: SharedSettings;
  source: RepositorySource;
  /** Accounts processed at once; they split `settings.concurrency` between them. */
  concurrency?: number;
  generatedAt?: Date;
}

export type AccountStatus = "succeeded" | "failed";

export interface AccountOutcome {
  account: string;
  limit: number | null;
  status: AccountStatus;
  outputDir: string;
  owned: number;
  starred: number;
  error: string | null;
}

export interface BatchSummary {
  outcomes: AccountOutcome[];
  succeeded: number;
  failed: number;
}

export const NO_REPOSITORIES_MESSAGE = "no repositories collected";

export function settingsForAccount(shared: SharedSettings, account: string, baseDir: string): InventorySettings {
  return { ...shared, username: account, ...outputPathsFor(path.join(baseDir, accountDirectoryName(account))) };
}

export function lookupsPerAccount(concurrency: number, accountWorkers: number): number {
  return Math.max(1, Math.floor(concurrency / Math.max(1, accountWorkers)));
}

async function processAccount(config: RunConfig, options: BatchOptions): Promise<AccountOutcome> {
  const settings = settingsForAccount(options.settings, config.account, options.baseDir);
  const outcome: AccountOutcome = {
    account: config.account,
    limit: config.limit ?? null,
    status: "failed",
    outputDir: path.dirname(settings.reportMd),
    owned: 0,
    starred: 0,
    error: null,
  };

  console.log(`\n⏳ Processing ${config.account}${config.limit ? ` (limit ${config.limit})` : ""}`);
  try {
    const result = await runInventory(settings, options.source, { limit: config.limit, generatedAt: options.generatedAt });
    outcome.owned = result.owned?.records.length ?? 0;
    outcome.starred = result.starred?.records.length ?? 0;
    if (result.empty) {
      outcome.error = NO_REPOSITORIES_MESSAGE;
      console.error(`❌ ${config.account}: ${NO_REPOSITORIES_MESSAGE}`);
      return outcome;
    }
    outcome.status = "succeeded";
    console.log(`✅ ${config.account}: ${outcome.owned} owned, ${outcome.starred} starred → ${outcome.outputDir}`);
  } catch (error) {
    outcome.error = describeError(error);
    console.error(`❌ Failed to process ${config.account}: ${outcome.error}`);
    if (options.settings.debug && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
  }
  return outcome;
}

/**
 * Runs the full inventory for every account. A failing account is recorded
 * and the batch moves on; outcomes keep the order of `configs`.
 */
export async function runBatch(configs: RunConfig[], options: BatchOptions): Promise<BatchSummary> {
  const outcomes: AccountOutcome[] = new Array(configs.length);
  const workerCount = Math.min(Math.max(1, options.concurrency ?? 1), configs.length || 1);
  // accounts share the lookup budget, so at most max(concurrency, accounts) lookups run at once
  const accountOptions: BatchOptions = {
    ...options,
    settings: { ...options.settings, concurrency: lookupsPerAccount(options.settings.concurrency, workerCount) },
  };
  let index = 0;

  const worker = async () => {
    while (true) {
      const currentIndex = index++;
      if (currentIndex >= configs.length) {
        break;
      }
      outcomes[currentIndex] = await processAccount(configs[currentIndex], accountOptions);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  const succeeded = outcomes.filter((outcome) => outcome.status === "succeeded").length;
  return { outcomes, succeeded, failed: outcomes.length - succeeded };
}

export function batchTable(summary: BatchSummary): string {
  const table = new Table({ head: ["Account", "Status", "Owned", "Starred", "Output / error"] });
  for (const outcome of summary.outcomes) {
    table.push([
      outcome.limit === null ? outcome.account : `${outcome.account} (limit ${outcome.limit})`,
      outcome.status === "succeeded" ? "✅" : "❌",
      outcome.owned,
      outcome.starred,
      outcome.error ?? outcome.outputDir,
    ]);
  }
  return table.toString();
}
