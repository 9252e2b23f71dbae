import { Octokit } from "@octokit/rest";

import { AuthenticationError, ExternalToolError, describeError, type ExternalToolFailure } from "../errors";
import { parseRestRepositories, type OwnedRepositoryPayload, type RestRepositoryPayload } from "../schemas";
import type { RateLimiter } from "../rate-limiter";
import type { RepositorySource } from "./source";

const PER_PAGE = 100;

export function createGithubOctokit(token: string, rateLimiter: RateLimiter): Octokit {
  const octokit = new Octokit({ auth: token, userAgent: "repo-inventory" });
  octokit.hook.before("request", async () => {
    await rateLimiter.checkAndWait();
  });
  octokit.hook.after("request", (response) => {
    rateLimiter.updateFromHeaders(response.headers);
  });
  return octokit;
}

function statusOf(error: unknown): number | null {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return null;
}

function toSourceError(error: unknown, route: string): ExternalToolError {
  const status = statusOf(error);
  // exitCode carries the HTTP status for API calls
  const failure: ExternalToolFailure = { argv: [route], stderr: describeError(error), exitCode: status, cause: error };
  if (status === 401) {
    return new AuthenticationError(failure);
  }
  return new ExternalToolError(failure, `Request failed: ${route}`);
}

/** Maps a REST repository onto the `gh repo list` shape so both sources feed one normalizer. */
export function toOwnedPayload(repo: RestRepositoryPayload): OwnedRepositoryPayload {
  return {
    name: repo.name,
    description: repo.description ?? null,
    url: repo.html_url ?? null,
    isPrivate: repo.private ?? false,
    isFork: repo.fork ?? false,
    createdAt: repo.created_at ?? null,
    updatedAt: repo.updated_at ?? null,
    defaultBranchRef: repo.default_branch ? { name: repo.default_branch } : null,
    primaryLanguage: repo.language ? { name: repo.language } : null,
    diskUsage: repo.size ?? null,
  };
}

export class OctokitSource implements RepositorySource {
  readonly kind = "api";
  private readonly octokit: Octokit;

  constructor(octokit: Octokit) {
    this.octokit = octokit;
  }

  async listOwned(username: string, limit?: number) {
    const route = `GET /users/${username}/repos`;
    const pages: unknown[] = [];
    let received = 0;

    try {
      const iterator = this.octokit.paginate.iterator(this.octokit.repos.listForUser, {
        username,
        type: "owner",
        per_page: limit === undefined ? PER_PAGE : Math.min(PER_PAGE, limit),
      });
      for await (const response of iterator) {
        pages.push(response.data);
        received += response.data.length;
        if (limit !== undefined && received >= limit) {
          break;
        }
      }
    } catch (error) {
      throw toSourceError(error, route);
    }

    const repos = parseRestRepositories(pages, "owned repository listing").map(toOwnedPayload);
    return limit === undefined ? repos : repos.slice(0, limit);
  }

  async listStarred(username?: string) {
    const route = username ? `GET /users/${username}/starred` : "GET /user/starred";
    let starred: unknown;
    try {
      starred = username
        ? await this.octokit.paginate(this.octokit.activity.listReposStarredByUser, { username, per_page: PER_PAGE })
        : await this.octokit.paginate(this.octokit.activity.listReposStarredByAuthenticatedUser, { per_page: PER_PAGE });
    } catch (error) {
      throw toSourceError(error, route);
    }
    return parseRestRepositories(starred);
  }

  async countBranches(owner: string, name: string) {
    const route = `GET /repos/${owner}/${name}/branches`;
    try {
      const branches = await this.octokit.paginate(this.octokit.repos.listBranches, {
        owner,
        repo: name,
        per_page: PER_PAGE,
      });
      return branches.length;
    } catch (error) {
      throw toSourceError(error, route);
    }
  }
}
