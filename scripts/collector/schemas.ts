import { z } from "zod";

import { DataDecodeError } from "./errors";

const NamedRef = z.object({ name: z.string().nullish() }).nullish();

/** One entry of `gh repo list --json ...`. */
export const OwnedRepositoryPayloadSchema = z.object({
  name: z.string(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  isPrivate: z.boolean().nullish(),
  isFork: z.boolean().nullish(),
  createdAt: z.string().nullish(),
  updatedAt: z.string().nullish(),
  defaultBranchRef: NamedRef,
  primaryLanguage: NamedRef,
  diskUsage: z.number().int().nonnegative().nullish(),
});

/** A repository object as the REST API returns it. */
export const RestRepositoryPayloadSchema = z.object({
  name: z.string(),
  full_name: z.string().nullish(),
  owner: z.object({ login: z.string() }).nullish(),
  description: z.string().nullish(),
  html_url: z.string().nullish(),
  private: z.boolean().nullish(),
  fork: z.boolean().nullish(),
  created_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  pushed_at: z.string().nullish(),
  default_branch: z.string().nullish(),
  language: z.string().nullish(),
  size: z.number().int().nonnegative().nullish(),
  stargazers_count: z.number().nullish(),
  forks_count: z.number().nullish(),
  watchers_count: z.number().nullish(),
  open_issues_count: z.number().nullish(),
  license: z.object({ name: z.string().nullish() }).nullish(),
  topics: z.array(z.string()).nullish(),
  homepage: z.string().nullish(),
  archived: z.boolean().nullish(),
  disabled: z.boolean().nullish(),
});

// `application/vnd.github.star+json` wraps each repository with its star date.
const StarredEnvelopeSchema = z.object({
  starred_at: z.string().nullish(),
  repo: RestRepositoryPayloadSchema,
});

export const StarredEntrySchema = z.union([StarredEnvelopeSchema, RestRepositoryPayloadSchema]);

export type OwnedRepositoryPayload = z.infer<typeof OwnedRepositoryPayloadSchema>;
export type RestRepositoryPayload = z.infer<typeof RestRepositoryPayloadSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

function previewOf(value: unknown): string {
  return JSON.stringify(value) ?? String(value);
}

export function parseOwnedRepositories(value: unknown): OwnedRepositoryPayload[] {
  if (value === null) {
    return [];
  }
  const result = z.array(OwnedRepositoryPayloadSchema).safeParse(value);
  if (!result.success) {
    throw new DataDecodeError("owned repository listing", describeIssues(result.error), previewOf(value));
  }
  return result.data;
}

/**
 * Accepts a flat page, an array of pages (`--slurp`), or enveloped entries and
 * returns the repositories in listing order.
 */
export function parseRestRepositories(value: unknown, operation = "starred repository listing"): RestRepositoryPayload[] {
  if (value === null) {
    return [];
  }
  const entries = Array.isArray(value) ? value.flat() : [value];
  const result = z.array(StarredEntrySchema).safeParse(entries);
  if (!result.success) {
    throw new DataDecodeError(operation, describeIssues(result.error), previewOf(value));
  }
  return result.data.map((entry) => ("repo" in entry ? entry.repo : entry));
}

/** Sums per-page counts (`--jq length`) or counts a branch list. */
export function parseBranchCount(value: unknown): number {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (Array.isArray(value)) {
    if (value.every((item): item is number => typeof item === "number" && Number.isInteger(item) && item >= 0)) {
      return value.reduce((sum, count) => sum + count, 0);
    }
    return value.flat().length;
  }
  throw new DataDecodeError("branch count", "expected a non-negative integer", previewOf(value));
}
