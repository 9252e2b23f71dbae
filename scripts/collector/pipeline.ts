import { collectOwned, collectStarred } from "./collect";
import type { InventorySettings } from "./config";
import { enrichBranchCounts, type EnrichOptions } from "./enrich";
import { ConfigurationError, FileOperationError } from "./errors";
import type { RepositorySource } from "./sources/source";
import type { CollectionResult, OwnedRepositoryRecord, StarredRepositoryRecord } from "./types";
import { readCsv, writeOwnedCsv, writeStarredCsv, type CsvRow } from "../report/csv";
import { buildReport, writeReport } from "../report/markdown";

export interface InventoryOptions {
  ownedOnly?: boolean;
  starredOnly?: boolean;
  skipReport?: boolean;
  /** Collection limit applied to each listing. */
  limit?: number;
  generatedAt?: Date;
}

export interface InventoryResult {
  account: string;
  owned: CollectionResult<OwnedRepositoryRecord> | null;
  starred: CollectionResult<StarredRepositoryRecord> | null;
  /** CSV and report files written by this run. */
  files: string[];
  reportPath: string | null;
  /** Neither listing produced a record. */
  empty: boolean;
}

export interface ReportOptions {
  ownedOnly?: boolean;
  starredOnly?: boolean;
  limitApplied?: number | null;
  ownedAvailable?: number;
  starredAvailable?: number;
  generatedAt?: Date;
}

export interface ReportResult {
  reportPath: string;
  ownedRows: CsvRow[];
  starredRows: CsvRow[];
}

function resolveKinds(options: { ownedOnly?: boolean; starredOnly?: boolean }) {
  if (options.ownedOnly && options.starredOnly) {
    throw new ConfigurationError("--owned-only and --starred-only cannot be combined");
  }
  return { owned: !options.starredOnly, starred: !options.ownedOnly };
}

/** Reads the CSVs back and renders the report from them. */
export async function buildReportFromFiles(
  settings: InventorySettings,
  options: ReportOptions = {}
): Promise<ReportResult> {
  const kinds = resolveKinds(options);
  const ownedRows = kinds.owned ? await readCsv(settings.ownedCsv) : [];
  const starredRows = kinds.starred ? await readCsv(settings.starredCsv) : [];

  if (ownedRows.length === 0 && starredRows.length === 0) {
    throw new FileOperationError(kinds.owned ? settings.ownedCsv : settings.starredCsv, "find repository data in");
  }

  const content = buildReport({
    account: settings.username,
    owned: ownedRows.length > 0 ? ownedRows : undefined,
    starred: starredRows.length > 0 ? starredRows : undefined,
    limitApplied: options.limitApplied ?? null,
    ownedAvailable: options.ownedAvailable,
    starredAvailable: options.starredAvailable,
    source: settings.source,
    generatedAt: options.generatedAt,
    ownedDisplayLimit: settings.reportOwnedLimit,
    starredDisplayLimit: settings.reportStarredLimit,
  });
  await writeReport(settings.reportMd, content);
  return { reportPath: settings.reportMd, ownedRows, starredRows };
}

/**
 * Collect, enrich and write each requested listing, then build the report
 * from the written files. Collection failures propagate; branch lookups
 * degrade to the placeholder inside the enricher.
 */
export async function runInventory(
  settings: InventorySettings,
  source: RepositorySource,
  options: InventoryOptions = {}
): Promise<InventoryResult> {
  const kinds = resolveKinds(options);
  const enrichOptions: EnrichOptions = {
    concurrency: settings.concurrency,
    timeoutMs: settings.timeoutMs,
    debug: settings.debug,
  };
  const files: string[] = [];
  let owned: CollectionResult<OwnedRepositoryRecord> | null = null;
  let starred: CollectionResult<StarredRepositoryRecord> | null = null;

  if (kinds.owned) {
    console.log(`⏳ Collecting owned repositories for ${settings.username}...`);
    const collected = await collectOwned(source, settings.username, options.limit);
    owned = { ...collected, records: await enrichBranchCounts(collected.records, source, enrichOptions) };
    if (owned.records.length > 0) {
      await writeOwnedCsv(settings.ownedCsv, owned.records);
      files.push(settings.ownedCsv);
    } else {
      console.log(`ℹ️  No owned repositories found for ${settings.username}`);
    }
  }

  if (kinds.starred) {
    console.log(`⏳ Collecting starred repositories for ${settings.username}...`);
    const collected = await collectStarred(source, settings.username, options.limit);
    starred = { ...collected, records: await enrichBranchCounts(collected.records, source, enrichOptions) };
    if (starred.records.length > 0) {
      await writeStarredCsv(settings.starredCsv, starred.records);
      files.push(settings.starredCsv);
    } else {
      console.log(`ℹ️  No starred repositories found for ${settings.username}`);
    }
  }

  const empty = files.length === 0;
  let reportPath: string | null = null;
  if (!options.skipReport && !empty) {
    const report = await buildReportFromFiles(settings, {
      // only read back the listings written above
      ownedOnly: !starred?.records.length,
      starredOnly: !owned?.records.length,
      limitApplied: options.limit ?? null,
      ownedAvailable: owned?.total,
      starredAvailable: starred?.total,
      generatedAt: options.generatedAt,
    });
    reportPath = report.reportPath;
    files.push(reportPath);
  }

  return { account: settings.username, owned, starred, files, reportPath, empty };
}
