import fs from "fs-extra";
import { randomUUID } from "node:crypto";
import path from "node:path";

import { FileOperationError } from "../collector/errors";
import type { OwnedRepositoryRecord, StarredRepositoryRecord } from "../collector/types";

export type CsvRow = Record<string, string>;

export const OWNED_COLUMNS = [
  "name",
  "description",
  "url",
  "visibility",
  "is_fork",
  "creation_date",
  "last_update_date",
  "default_branch",
  "number_of_branches",
  "primary_language",
  "size_kb",
] as const;

export const STARRED_COLUMNS = [
  "name",
  "full_name",
  "owner",
  "description",
  "url",
  "visibility",
  "is_fork",
  "creation_date",
  "last_update_date",
  "last_push_date",
  "default_branch",
  "number_of_branches",
  "primary_language",
  "size_kb",
  "stars",
  "forks",
  "watchers",
  "open_issues",
  "license",
  "topics",
  "homepage",
  "archived",
  "disabled",
] as const;

export type OwnedColumn = (typeof OWNED_COLUMNS)[number];
export type StarredColumn = (typeof STARRED_COLUMNS)[number];

/** `2024-05-20T18:40:00Z` becomes `2024-05-20`; unparseable values pass through. */
export function formatDate(value: string | null): string {
  if (!value) {
    return "";
  }
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) {
    return value;
  }
  return date.toISOString().slice(0, 10);
}

export function toOwnedRow(record: OwnedRepositoryRecord): Record<OwnedColumn, string> {
  return {
    name: record.name,
    description: record.description ?? "",
    url: record.url,
    visibility: record.visibility,
    is_fork: String(record.isFork),
    creation_date: formatDate(record.createdAt),
    last_update_date: formatDate(record.updatedAt),
    default_branch: record.defaultBranch,
    number_of_branches: String(record.branchCount),
    primary_language: record.primaryLanguage ?? "",
    size_kb: record.sizeKb === null ? "" : String(record.sizeKb),
  };
}

export function toStarredRow(record: StarredRepositoryRecord): Record<StarredColumn, string> {
  return {
    name: record.name,
    full_name: record.fullName,
    owner: record.owner,
    description: record.description ?? "",
    url: record.url,
    visibility: record.visibility,
    is_fork: String(record.isFork),
    creation_date: formatDate(record.createdAt),
    last_update_date: formatDate(record.updatedAt),
    last_push_date: formatDate(record.pushedAt),
    default_branch: record.defaultBranch,
    number_of_branches: String(record.branchCount),
    primary_language: record.primaryLanguage ?? "",
    size_kb: record.sizeKb === null ? "" : String(record.sizeKb),
    stars: String(record.stars),
    forks: String(record.forks),
    watchers: String(record.watchers),
    open_issues: String(record.openIssues),
    license: record.license ?? "",
    topics: record.topics.join(", "),
    homepage: record.homepage ?? "",
    archived: String(record.archived),
    disabled: String(record.disabled),
  };
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsv(columns: readonly string[], rows: CsvRow[]): string {
  const lines = [columns.map(escapeCsvField).join(",")];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsvField(row[column] ?? "")).join(","));
  }
  return `${lines.join("\n")}\n`;
}

function splitRecords(text: string): string[][] {
  const records: string[][] = [];
  let fields: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    if (quoted) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i += 1;
        } else {
          quoted = false;
        }
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      quoted = true;
    } else if (char === ",") {
      fields.push(field);
      field = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") {
        i += 1;
      }
      fields.push(field);
      records.push(fields);
      fields = [];
      field = "";
    } else {
      field += char;
    }
  }

  if (field.length > 0 || fields.length > 0) {
    fields.push(field);
    records.push(fields);
  }

  return records.filter((record) => !(record.length === 1 && record[0] === ""));
}

/** Rows keyed by header; short rows are padded with empty strings and extra cells dropped. */
export function parseCsv(text: string): CsvRow[] {
  const [header, ...records] = splitRecords(text.replace(/^﻿/, ""));
  if (!header) {
    return [];
  }
  return records.map((record) => {
    const row: CsvRow = {};
    header.forEach((column, index) => {
      row[column] = record[index] ?? "";
    });
    return row;
  });
}

/** Replaces `filePath` in one step so a failed write never leaves a partial file behind. */
export async function writeCsv(filePath: string, columns: readonly string[], rows: CsvRow[]): Promise<void> {
  const tempPath = path.join(path.dirname(filePath), `.${path.basename(filePath)}.${randomUUID()}.tmp`);
  try {
    await fs.outputFile(tempPath, formatCsv(columns, rows), "utf8");
    await fs.move(tempPath, filePath, { overwrite: true });
  } catch (error) {
    if (await fs.pathExists(tempPath)) {
      await fs.remove(tempPath);
    }
    throw new FileOperationError(filePath, "write", error);
  }
  console.log(`Data written to ${filePath}`);
}

export async function writeOwnedCsv(
  filePath: string,
  records: OwnedRepositoryRecord[],
  columns: readonly string[] = OWNED_COLUMNS
): Promise<void> {
  await writeCsv(filePath, columns, records.map(toOwnedRow));
}

export async function writeStarredCsv(
  filePath: string,
  records: StarredRepositoryRecord[],
  columns: readonly string[] = STARRED_COLUMNS
): Promise<void> {
  await writeCsv(filePath, columns, records.map(toStarredRow));
}

/** A missing file reads as no rows. */
export async function readCsv(filePath: string): Promise<CsvRow[]> {
  if (!(await fs.pathExists(filePath))) {
    console.warn(`⚠️  ${filePath} not found`);
    return [];
  }
  try {
    return parseCsv(await fs.readFile(filePath, "utf8"));
  } catch (error) {
    throw new FileOperationError(filePath, "read", error);
  }
}
