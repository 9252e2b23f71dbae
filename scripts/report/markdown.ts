import fs from "fs-extra";

import { FileOperationError } from "../collector/errors";
import type { SourceKind } from "../collector/types";
import type { CsvRow } from "./csv";

export const DEFAULT_OWNED_DISPLAY_LIMIT = 30;
export const DEFAULT_STARRED_DISPLAY_LIMIT = 25;
export const TOP_LANGUAGE_COUNT = 5;
export const UNKNOWN_LANGUAGE = "Unknown";
export const ARCHIVED_MARKER = "🗄️";

const OWNED_DESCRIPTION_BUDGET = 50;
const STARRED_DESCRIPTION_BUDGET = 60;

export interface ReportInput {
  account: string;
  /** Omitted sections are left out of the document entirely. */
  owned?: CsvRow[];
  starred?: CsvRow[];
  /** Collection limit the rows were gathered under, if any. */
  limitApplied?: number | null;
  /** Repositories the source listed before the collection limit trimmed them. */
  ownedAvailable?: number;
  starredAvailable?: number;
  source?: SourceKind;
  generatedAt?: Date;
  /** Table rows per section; a negative value shows every row. */
  ownedDisplayLimit?: number;
  starredDisplayLimit?: number;
}

export interface LanguageCount {
  language: string;
  count: number;
}

export interface RowSummary {
  total: number;
  public: number;
  private: number;
  forks: number;
  originals: number;
  archived: number;
  languages: LanguageCount[];
}

export function formatNumber(value: string | undefined): string {
  if (!value || !/^-?\d+$/.test(value)) {
    return value ?? "";
  }
  return Number.parseInt(value, 10).toLocaleString("en-US");
}

/** Sizes are stored in KB and displayed in MB. */
export function formatSizeMb(value: string | undefined): string {
  if (!value || !/^\d+$/.test(value)) {
    return value ?? "";
  }
  const mb = Number.parseInt(value, 10) / 1024;
  return mb < 0.1 ? "<0.1" : mb.toFixed(1);
}

/** Budget counts code points, so a surrogate pair is never split. */
export function truncateDescription(text: string, maxLength: number): string {
  const chars = Array.from(text);
  if (chars.length <= maxLength) {
    return text;
  }
  return `${chars.slice(0, maxLength - 3).join("")}...`;
}

function collapseNewlines(text: string): string {
  return text.replace(/\r\n|\r|\n/g, " ");
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

function descriptionCell(text: string | undefined, budget: number): string {
  return escapeCell(truncateDescription(collapseNewlines(text ?? "").trim(), budget));
}

function linkCell(row: CsvRow): string {
  const name = escapeCell(row.name ?? "");
  return row.url ? `[${name}](${row.url})` : name;
}

export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

/** Most frequent languages first; equal counts keep the order they were first seen in. */
export function topLanguages(rows: CsvRow[], count = TOP_LANGUAGE_COUNT): LanguageCount[] {
  const counts = new Map<string, number>();
  for (const row of rows) {
    const language = row.primary_language?.trim() || UNKNOWN_LANGUAGE;
    counts.set(language, (counts.get(language) ?? 0) + 1);
  }
  return Array.from(counts, ([language, total]) => ({ language, count: total }))
    .sort((a, b) => b.count - a.count)
    .slice(0, count);
}

export function summarizeRows(rows: CsvRow[]): RowSummary {
  const forks = rows.filter((row) => row.is_fork === "true").length;
  return {
    total: rows.length,
    public: rows.filter((row) => row.visibility === "public").length,
    private: rows.filter((row) => row.visibility === "private").length,
    forks,
    originals: rows.length - forks,
    archived: rows.filter((row) => row.archived === "true").length,
    languages: topLanguages(rows),
  };
}

function starCount(row: CsvRow): number {
  const stars = Number.parseInt(row.stars ?? "", 10);
  return Number.isNaN(stars) ? 0 : stars;
}

function displayedRows(sorted: CsvRow[], displayLimit: number): CsvRow[] {
  return displayLimit < 0 ? sorted : sorted.slice(0, displayLimit);
}

function languageLine(languages: LanguageCount[]): string[] {
  if (languages.length === 0) {
    return [];
  }
  return [`**Top Languages:** ${languages.map(({ language, count }) => `${language}: ${count}`).join(" | ")}`, ""];
}

function truncationFooter(
  shown: number,
  rowCount: number,
  available: number,
  noun: string,
  limitApplied: number | null
): string[] {
  const total = Math.max(rowCount, available);
  const limitNote = limitApplied !== null ? ` (collection limited to ${limitApplied})` : "";
  if (shown < total) {
    return ["", `*Showing ${shown} of ${total} ${noun}${limitNote}.*`];
  }
  if (limitApplied !== null && rowCount === limitApplied) {
    return ["", `*Showing all ${total} ${noun}${limitNote}.*`];
  }
  return [];
}

export function renderOwnedSection(
  rows: CsvRow[],
  displayLimit: number,
  limitApplied: number | null,
  available = rows.length
): string[] {
  if (rows.length === 0) {
    return ["No owned repository data found.", ""];
  }
  const summary = summarizeRows(rows);
  const sorted = [...rows].sort((a, b) => (b.last_update_date ?? "").localeCompare(a.last_update_date ?? ""));
  const shown = displayedRows(sorted, displayLimit);

  const lines = [
    "## Owned Repositories",
    "",
    `**Total:** ${summary.total} repositories`,
    "",
    `- **Public:** ${summary.public} | **Private:** ${summary.private}`,
    `- **Original:** ${summary.originals} | **Forks:** ${summary.forks}`,
    "",
    ...languageLine(summary.languages),
    "| Name | Description | Visibility | Language | Size (MB) | Branches | Updated |",
    "|------|-------------|------------|----------|-----------|----------|---------|",
  ];

  for (const row of shown) {
    const visibility = row.is_fork === "true" ? `${row.visibility ?? ""} (fork)` : row.visibility ?? "";
    const cells = [
      linkCell(row),
      descriptionCell(row.description, OWNED_DESCRIPTION_BUDGET),
      visibility,
      escapeCell(row.primary_language ?? ""),
      formatSizeMb(row.size_kb),
      row.number_of_branches ?? "",
      row.last_update_date ?? "",
    ];
    lines.push(`| ${cells.join(" | ")} |`);
  }

  lines.push(...truncationFooter(shown.length, rows.length, available, "repositories", limitApplied), "", "---", "");
  return lines;
}

export function renderStarredSection(
  rows: CsvRow[],
  displayLimit: number,
  limitApplied: number | null,
  available = rows.length
): string[] {
  if (rows.length === 0) {
    return ["No starred repository data found.", ""];
  }
  const summary = summarizeRows(rows);
  const sorted = [...rows].sort((a, b) => starCount(b) - starCount(a));
  const shown = displayedRows(sorted, displayLimit);

  const lines = [
    "## Starred Repositories",
    "",
    `**Total:** ${summary.total} starred repositories`,
    "",
    `- **Public:** ${summary.public} | **Private:** ${summary.private} | **Archived:** ${summary.archived}`,
    "",
    ...languageLine(summary.languages),
    "| Repository | Owner | Description | Language | Stars | Forks | Updated |",
    "|------------|-------|-------------|----------|-------|-------|---------|",
  ];

  for (const row of shown) {
    const name = row.archived === "true" ? `${linkCell(row)} ${ARCHIVED_MARKER}` : linkCell(row);
    const cells = [
      name,
      escapeCell(row.owner ?? ""),
      descriptionCell(row.description, STARRED_DESCRIPTION_BUDGET),
      escapeCell(row.primary_language ?? ""),
      formatNumber(row.stars),
      formatNumber(row.forks),
      row.last_update_date ?? "",
    ];
    lines.push(`| ${cells.join(" | ")} |`);
  }

  lines.push(...truncationFooter(shown.length, rows.length, available, "starred repositories", limitApplied), "", "---", "");
  return lines;
}

function renderHeader(account: string, source: SourceKind, generatedAt: Date): string[] {
  const dataSource = source === "api" ? "GitHub REST API" : "GitHub CLI (`gh`)";
  return [
    "# GitHub Repository Inventory",
    "",
    `**Generated:** ${formatTimestamp(generatedAt)}  `,
    `**Account:** @${account}`,
    "",
    "## Overview",
    "",
    `Repositories owned and starred by @${account}, with metadata, branch counts and language statistics collected through the ${dataSource}.`,
    "",
    "## Methodology & Notes",
    "",
    `- **Data Source:** ${dataSource}`,
    "- **Repository Sizes:** Displayed in MB (converted from KB)",
    "- **Sorting:** Owned repositories by last update date, starred by star count",
    `- **Indicators:** ${ARCHIVED_MARKER} = archived, (fork) = forked repository, N/A = branch count unavailable`,
    "- **Limitations:** Tables show the most relevant entries; the CSV exports hold every collected row",
    "",
    "---",
    "",
  ];
}

/** Pure: the same rows and timestamp always produce the same document. */
export function buildReport(input: ReportInput): string {
  const limitApplied = input.limitApplied ?? null;
  const lines = renderHeader(input.account, input.source ?? "cli", input.generatedAt ?? new Date());

  if (input.owned) {
    lines.push(
      ...renderOwnedSection(
        input.owned,
        input.ownedDisplayLimit ?? DEFAULT_OWNED_DISPLAY_LIMIT,
        limitApplied,
        input.ownedAvailable
      )
    );
  }
  if (input.starred) {
    lines.push(
      ...renderStarredSection(
        input.starred,
        input.starredDisplayLimit ?? DEFAULT_STARRED_DISPLAY_LIMIT,
        limitApplied,
        input.starredAvailable
      )
    );
  }

  lines.push("*Generated by repo-inventory*");
  return `${lines.join("\n")}\n`;
}

export async function writeReport(filePath: string, content: string): Promise<void> {
  try {
    await fs.outputFile(filePath, content, "utf8");
  } catch (error) {
    throw new FileOperationError(filePath, "write", error);
  }
  console.log(`✅ Markdown report created: ${filePath}`);
}
