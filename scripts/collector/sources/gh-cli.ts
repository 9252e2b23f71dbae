import type { CommandExecutor } from "../executor";
import { parseBranchCount, parseOwnedRepositories, parseRestRepositories } from "../schemas";
import type { RepositorySource } from "./source";

export const OWNED_JSON_FIELDS = [
  "name",
  "description",
  "url",
  "isPrivate",
  "isFork",
  "createdAt",
  "updatedAt",
  "defaultBranchRef",
  "primaryLanguage",
  "diskUsage",
];

// `gh repo list` needs an explicit cap; this is its practical ceiling.
export const DEFAULT_OWNED_LIMIT = 1000;

export interface GhCliSourceOptions {
  /** Runs the listings, which paginate through every page. */
  executor: CommandExecutor;
  /** Runs branch lookups; falls back to `executor`. */
  lookupExecutor?: CommandExecutor;
  binary?: string;
}

export class GhCliSource implements RepositorySource {
  readonly kind = "cli";
  private readonly executor: CommandExecutor;
  private readonly lookupExecutor: CommandExecutor;
  private readonly binary: string;

  constructor({ executor, lookupExecutor, binary = "gh" }: GhCliSourceOptions) {
    this.executor = executor;
    this.lookupExecutor = lookupExecutor ?? executor;
    this.binary = binary;
  }

  ownedArgs(username: string, limit?: number): string[] {
    return [
      this.binary,
      "repo",
      "list",
      username,
      "--limit",
      String(limit ?? DEFAULT_OWNED_LIMIT),
      "--json",
      OWNED_JSON_FIELDS.join(","),
    ];
  }

  starredArgs(username?: string): string[] {
    const endpoint = username ? `users/${username}/starred?per_page=100` : "user/starred?per_page=100";
    return [this.binary, "api", endpoint, "--paginate", "--slurp"];
  }

  branchArgs(owner: string, name: string): string[] {
    return [this.binary, "api", `repos/${owner}/${name}/branches?per_page=100`, "--paginate", "--jq", "length"];
  }

  async listOwned(username: string, limit?: number) {
    const output = await this.executor.execute(this.ownedArgs(username, limit));
    return parseOwnedRepositories(output);
  }

  async listStarred(username?: string) {
    const output = await this.executor.execute(this.starredArgs(username));
    return parseRestRepositories(output);
  }

  async countBranches(owner: string, name: string) {
    const output = await this.lookupExecutor.execute(this.branchArgs(owner, name));
    return parseBranchCount(output);
  }
}
