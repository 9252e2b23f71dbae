import type { OwnedRepositoryPayload, RestRepositoryPayload } from "../schemas";
import type { RepositorySource } from "../sources/source";

export function ownedPayload(overrides: Partial<OwnedRepositoryPayload> = {}): OwnedRepositoryPayload {
  return {
    name: "widgets",
    description: "Widget toolkit",
    url: "https://github.com/octo-user/widgets",
    isPrivate: false,
    isFork: false,
    createdAt: "2023-03-01T09:15:00Z",
    updatedAt: "2024-05-20T18:40:00Z",
    defaultBranchRef: { name: "main" },
    primaryLanguage: { name: "TypeScript" },
    diskUsage: 2048,
    ...overrides,
  };
}

export function restRepository(overrides: Partial<RestRepositoryPayload> = {}): RestRepositoryPayload {
  return {
    name: "gadgets",
    full_name: "acme/gadgets",
    owner: { login: "acme" },
    description: "Gadget server",
    html_url: "https://github.com/acme/gadgets",
    private: false,
    fork: false,
    created_at: "2021-01-10T00:00:00Z",
    updated_at: "2024-06-01T12:00:00Z",
    pushed_at: "2024-05-30T08:00:00Z",
    default_branch: "main",
    language: "Go",
    size: 512,
    stargazers_count: 1200,
    forks_count: 80,
    watchers_count: 1200,
    open_issues_count: 7,
    license: { name: "MIT License" },
    topics: ["server", "iot"],
    homepage: "https://gadgets.example.com",
    archived: false,
    disabled: false,
    ...overrides,
  };
}

export interface FakeSourceData {
  owned?: OwnedRepositoryPayload[];
  starred?: RestRepositoryPayload[];
  /** Branch count per `owner/name`; an Error value makes that lookup fail. */
  branches?: Record<string, number | Error>;
  ownedError?: Error;
  starredError?: Error;
}

/** In-memory source that records every call it receives. */
export class FakeSource implements RepositorySource {
  readonly kind = "fake";
  readonly calls: string[] = [];

  constructor(private readonly data: FakeSourceData = {}) {}

  async listOwned(username: string, limit?: number) {
    this.calls.push(`owned:${username}:${limit ?? "all"}`);
    if (this.data.ownedError) {
      throw this.data.ownedError;
    }
    const owned = this.data.owned ?? [];
    return limit === undefined ? owned : owned.slice(0, limit);
  }

  async listStarred(username?: string) {
    this.calls.push(`starred:${username ?? "@me"}`);
    if (this.data.starredError) {
      throw this.data.starredError;
    }
    return this.data.starred ?? [];
  }

  async countBranches(owner: string, name: string) {
    this.calls.push(`branches:${owner}/${name}`);
    const value = this.data.branches?.[`${owner}/${name}`] ?? 1;
    if (value instanceof Error) {
      throw value;
    }
    return value;
  }
}
