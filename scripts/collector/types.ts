export type Visibility = "public" | "private";

export type SourceKind = "cli" | "api";

/** Placeholder written when a repository's branches could not be counted. */
export const BRANCH_COUNT_UNAVAILABLE = "N/A";

export type BranchCount = number | typeof BRANCH_COUNT_UNAVAILABLE;

interface CollectedFields {
  name: string;
  /** Account that owns the repository; the target user for owned listings. */
  owner: string;
  description: string | null;
  url: string;
  visibility: Visibility;
  isFork: boolean;
  createdAt: string | null;
  updatedAt: string | null;
  defaultBranch: string;
  primaryLanguage: string | null;
  sizeKb: number | null;
}

export interface OwnedRepository extends CollectedFields {
  kind: "owned";
}

export interface StarredRepository extends CollectedFields {
  kind: "starred";
  fullName: string;
  pushedAt: string | null;
  stars: number;
  forks: number;
  watchers: number;
  openIssues: number;
  license: string | null;
  topics: string[];
  homepage: string | null;
  archived: boolean;
  disabled: boolean;
}

export type CollectedRepository = OwnedRepository | StarredRepository;

export type Enriched<T extends CollectedRepository> = T & { branchCount: BranchCount };

export type OwnedRepositoryRecord = Enriched<OwnedRepository>;
export type StarredRepositoryRecord = Enriched<StarredRepository>;
export type RepositoryRecord = OwnedRepositoryRecord | StarredRepositoryRecord;

export interface CollectionResult<T> {
  records: T[];
  /** Records the source returned before any client-side truncation. */
  total: number;
  limit: number | null;
}

export interface RunConfig {
  account: string;
  limit?: number;
}
