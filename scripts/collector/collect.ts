import type { OwnedRepositoryPayload, RestRepositoryPayload } from "./schemas";
import type { RepositorySource } from "./sources/source";
import type { CollectionResult, OwnedRepository, StarredRepository } from "./types";

export function normalizeOwned(username: string, repo: OwnedRepositoryPayload): OwnedRepository {
  return {
    kind: "owned",
    name: repo.name,
    owner: username,
    description: repo.description ?? null,
    url: repo.url ?? "",
    visibility: repo.isPrivate ? "private" : "public",
    isFork: repo.isFork ?? false,
    createdAt: repo.createdAt ?? null,
    updatedAt: repo.updatedAt ?? null,
    defaultBranch: repo.defaultBranchRef?.name ?? "",
    primaryLanguage: repo.primaryLanguage?.name ?? null,
    sizeKb: repo.diskUsage ?? null,
  };
}

export function normalizeStarred(repo: RestRepositoryPayload): StarredRepository {
  const owner = repo.owner?.login ?? repo.full_name?.split("/")[0] ?? "";
  return {
    kind: "starred",
    name: repo.name,
    owner,
    fullName: repo.full_name ?? (owner ? `${owner}/${repo.name}` : repo.name),
    description: repo.description ?? null,
    url: repo.html_url ?? "",
    visibility: repo.private ? "private" : "public",
    isFork: repo.fork ?? false,
    createdAt: repo.created_at ?? null,
    updatedAt: repo.updated_at ?? null,
    pushedAt: repo.pushed_at ?? null,
    defaultBranch: repo.default_branch ?? "",
    primaryLanguage: repo.language ?? null,
    sizeKb: repo.size ?? null,
    stars: repo.stargazers_count ?? 0,
    forks: repo.forks_count ?? 0,
    watchers: repo.watchers_count ?? 0,
    openIssues: repo.open_issues_count ?? 0,
    license: repo.license?.name ?? null,
    topics: repo.topics ?? [],
    homepage: repo.homepage || null,
    archived: repo.archived ?? false,
    disabled: repo.disabled ?? false,
  };
}

/** The limit is sent to the source, so at most `limit` records are ever fetched. */
export async function collectOwned(
  source: RepositorySource,
  username: string,
  limit?: number
): Promise<CollectionResult<OwnedRepository>> {
  const payloads = await source.listOwned(username, limit);
  const records = payloads.map((payload) => normalizeOwned(username, payload));
  console.log(`Found ${records.length} repositories for ${username}`);
  return { records, total: records.length, limit: limit ?? null };
}

/**
 * Starred listings have no count cap upstream: every page is fetched and the
 * limit trims the tail afterwards.
 */
export async function collectStarred(
  source: RepositorySource,
  username?: string,
  limit?: number
): Promise<CollectionResult<StarredRepository>> {
  const payloads = await source.listStarred(username);
  const records = payloads.map(normalizeStarred);
  const kept = limit === undefined ? records : records.slice(0, limit);
  console.log(
    limit !== undefined && kept.length < records.length
      ? `Found ${records.length} starred repositories, keeping the ${kept.length} most recently starred`
      : `Found ${records.length} starred repositories`
  );
  return { records: kept, total: records.length, limit: limit ?? null };
}
