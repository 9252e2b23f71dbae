import { describe, expect, it, vi } from "vitest";

import { AuthenticationError, ExternalToolError } from "../errors";
import { restRepository } from "../__fixtures__/payloads";
import { OctokitSource, toOwnedPayload } from "./octokit";

function fakeOctokit(options: {
  pages?: unknown[][];
  paginate?: (route: unknown, params: unknown) => Promise<unknown[]>;
}) {
  async function* iterator() {
    for (const page of options.pages ?? []) {
      yield { data: page };
    }
  }

  const iteratorMock = vi.fn().mockReturnValue(iterator());
  const paginateMock = vi.fn(options.paginate ?? (async () => []));
  const paginate = Object.assign(paginateMock, { iterator: iteratorMock });

  const octokit = {
    paginate,
    repos: { listForUser: vi.fn(), listBranches: vi.fn() },
    activity: { listReposStarredByUser: vi.fn(), listReposStarredByAuthenticatedUser: vi.fn() },
  } as unknown as import("@octokit/rest").Octokit;

  return { octokit, iteratorMock, paginateMock };
}

describe("OctokitSource", () => {
  it("stops paginating owned repositories once the limit is reached", async () => {
    const firstPage = [restRepository({ name: "one" }), restRepository({ name: "two" })];
    const secondPage = [restRepository({ name: "three" })];
    const { octokit, iteratorMock } = fakeOctokit({ pages: [firstPage, secondPage] });

    const repos = await new OctokitSource(octokit).listOwned("octo-user", 2);

    expect(iteratorMock).toHaveBeenCalledWith(octokit.repos.listForUser, {
      username: "octo-user",
      type: "owner",
      per_page: 2,
    });
    expect(repos.map((repo) => repo.name)).toEqual(["one", "two"]);
  });

  it("maps REST fields onto the gh listing shape", () => {
    expect(toOwnedPayload(restRepository({ private: true, fork: true, language: null }))).toEqual({
      name: "gadgets",
      description: "Gadget server",
      url: "https://github.com/acme/gadgets",
      isPrivate: true,
      isFork: true,
      createdAt: "2021-01-10T00:00:00Z",
      updatedAt: "2024-06-01T12:00:00Z",
      defaultBranchRef: { name: "main" },
      primaryLanguage: null,
      diskUsage: 512,
    });
  });

  it("collects every starred repository for a named user", async () => {
    const { octokit, paginateMock } = fakeOctokit({
      paginate: async () => [restRepository({ name: "x" }), restRepository({ name: "y" })],
    });

    const starred = await new OctokitSource(octokit).listStarred("octo-user");

    expect(paginateMock).toHaveBeenCalledWith(octokit.activity.listReposStarredByUser, {
      username: "octo-user",
      per_page: 100,
    });
    expect(starred.map((repo) => repo.name)).toEqual(["x", "y"]);
  });

  it("counts branches across pages", async () => {
    const { octokit } = fakeOctokit({
      paginate: async () => [{ name: "main" }, { name: "dev" }, { name: "release" }],
    });

    await expect(new OctokitSource(octokit).countBranches("acme", "gadgets")).resolves.toBe(3);
  });

  it("maps a 401 response to AuthenticationError", async () => {
    const { octokit } = fakeOctokit({
      paginate: async () => {
        throw Object.assign(new Error("Bad credentials"), { status: 401 });
      },
    });

    await expect(new OctokitSource(octokit).listStarred()).rejects.toBeInstanceOf(AuthenticationError);
  });

  it("keeps the HTTP status of other failures", async () => {
    const { octokit } = fakeOctokit({
      paginate: async () => {
        throw Object.assign(new Error("Not Found"), { status: 404 });
      },
    });

    const error = await new OctokitSource(octokit).countBranches("acme", "gone").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExternalToolError);
    expect(error).toMatchObject({ exitCode: 404, argv: ["GET /repos/acme/gone/branches"] });
  });
});
