import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";

import { ConfigurationError } from "./errors";
import type { RunConfig, SourceKind } from "./types";

export type Environment = Record<string, string | undefined>;

/** Settings that do not depend on which account is being inventoried. */
export interface SharedSettings {
  outputBase: string;
  /** Table rows per report section; -1 shows every row. */
  reportOwnedLimit: number;
  reportStarredLimit: number;
  source: SourceKind;
  ghBinary: string;
  token: string | null;
  concurrency: number;
  timeoutMs: number | null;
  debug: boolean;
}

export interface OutputPaths {
  ownedCsv: string;
  starredCsv: string;
  reportMd: string;
}

export interface InventorySettings extends SharedSettings, OutputPaths {
  username: string;
}

/** Values given on the command line; each one wins over its environment variable. */
export interface SettingsOverrides {
  username?: string;
  outputBase?: string;
  ownedCsv?: string;
  starredCsv?: string;
  reportMd?: string;
  source?: string;
  concurrency?: string;
  timeoutMs?: string;
  debug?: boolean;
}

export const DEFAULT_OUTPUT_BASE = "docs";
export const OWNED_CSV_NAME = "repos.csv";
export const STARRED_CSV_NAME = "starred_repos.csv";
export const REPORT_NAME = "README.md";

function pick(...values: Array<string | undefined>): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== "")?.trim();
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined) {
    return fallback;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ConfigurationError(`Invalid ${name}`, `expected an integer, got '${raw}'`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) {
    throw new ConfigurationError(`Invalid ${name}`, `must be at least ${min}, got ${value}`);
  }
  return value;
}

function parseSource(raw: string | undefined): SourceKind {
  const value = raw ?? "cli";
  if (value === "cli" || value === "api") {
    return value;
  }
  throw new ConfigurationError("Invalid source", `expected 'cli' or 'api', got '${value}'`);
}

function parseFlag(raw: string | undefined): boolean {
  return raw !== undefined && ["1", "true", "yes", "on"].includes(raw.toLowerCase());
}

/** Directory name for an account; anything outside `[A-Za-z0-9._-]` becomes `_`. */
export function accountDirectoryName(account: string): string {
  const safe = account.replace(/[^a-z0-9._-]/gi, "_");
  return safe === "." || safe === ".." ? safe.replace(/\./g, "_") : safe;
}

export function outputPathsFor(directory: string): OutputPaths {
  return {
    ownedCsv: path.join(directory, OWNED_CSV_NAME),
    starredCsv: path.join(directory, STARRED_CSV_NAME),
    reportMd: path.join(directory, REPORT_NAME),
  };
}

export function loadSharedSettings(overrides: SettingsOverrides = {}, env: Environment = process.env): SharedSettings {
  const source = parseSource(pick(overrides.source, env.INVENTORY_SOURCE));
  const token = pick(env.GITHUB_TOKEN) ?? null;
  if (source === "api" && !token) {
    throw new ConfigurationError("GITHUB_TOKEN is required for the api source");
  }

  const timeoutMs = parseInteger("timeout", pick(overrides.timeoutMs, env.GH_COMMAND_TIMEOUT_MS), 0, 0);

  return {
    outputBase: pick(overrides.outputBase, env.OUTPUT_BASE) ?? DEFAULT_OUTPUT_BASE,
    reportOwnedLimit: parseInteger("REPORT_OWNED_LIMIT", pick(env.REPORT_OWNED_LIMIT), 30, -1),
    reportStarredLimit: parseInteger("REPORT_STARRED_LIMIT", pick(env.REPORT_STARRED_LIMIT), 25, -1),
    source,
    ghBinary: pick(env.GH_BINARY) ?? "gh",
    token,
    concurrency: parseInteger("concurrency", pick(overrides.concurrency, env.INVENTORY_CONCURRENCY), 1, 1),
    timeoutMs: timeoutMs > 0 ? timeoutMs : null,
    debug: overrides.debug ?? parseFlag(env.DEBUG),
  };
}

/**
 * Builds the settings for one run. Output paths default to
 * `<output base>/<username>/`; explicit paths win individually.
 */
export function loadSettings(overrides: SettingsOverrides = {}, env: Environment = process.env): InventorySettings {
  const shared = loadSharedSettings(overrides, env);
  const username = pick(overrides.username, env.GITHUB_USERNAME);
  if (!username) {
    throw new ConfigurationError("GitHub username is required", "pass --user or set GITHUB_USERNAME");
  }

  const defaults = outputPathsFor(path.join(shared.outputBase, accountDirectoryName(username)));
  return {
    ...shared,
    username,
    ownedCsv: pick(overrides.ownedCsv, env.OWNED_REPOS_CSV) ?? defaults.ownedCsv,
    starredCsv: pick(overrides.starredCsv, env.STARRED_REPOS_CSV) ?? defaults.starredCsv,
    reportMd: pick(overrides.reportMd, env.REPORT_OUTPUT_MD) ?? defaults.reportMd,
  };
}

const RunConfigSchema = z.object({
  account: z.string().trim().min(1, "account must not be empty"),
  limit: z.number().int().positive().optional(),
});

const BatchConfigSchema = z.union([z.array(RunConfigSchema), z.object({ configs: z.array(RunConfigSchema) })]);

export function parseRunConfigs(value: unknown, origin = "batch configuration"): RunConfig[] {
  const result = BatchConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigurationError(`Invalid ${origin}`, issues);
  }
  return Array.isArray(result.data) ? result.data : result.data.configs;
}

export async function readBatchConfig(filePath: string): Promise<RunConfig[]> {
  const resolved = path.resolve(filePath);
  if (!(await fs.pathExists(resolved))) {
    throw new ConfigurationError(`Batch configuration not found: ${resolved}`);
  }
  let parsed: unknown;
  try {
    parsed = await fs.readJson(resolved);
  } catch (error) {
    throw new ConfigurationError(`Batch configuration is not valid JSON: ${resolved}`, null, { cause: error });
  }
  return parseRunConfigs(parsed, `batch configuration ${resolved}`);
}

/** `octo-user` or `octo-user:50`. */
export function parseAccountArgument(value: string): RunConfig {
  const [account, limitText, ...rest] = value.split(":");
  if (!account?.trim() || rest.length > 0) {
    throw new ConfigurationError(`Invalid account '${value}'`, "expected name or name:limit");
  }
  if (limitText === undefined) {
    return { account: account.trim() };
  }
  return { account: account.trim(), limit: parseInteger(`limit for ${account}`, limitText.trim(), 0, 1) };
}
