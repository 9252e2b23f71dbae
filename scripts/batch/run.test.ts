import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "fs-extra";
import os from "node:os";
import path from "node:path";

import { loadSharedSettings } from "../collector/config";
import { AuthenticationError, DataDecodeError } from "../collector/errors";
import { ownedPayload, restRepository } from "../collector/__fixtures__/payloads";
import type { OwnedRepositoryPayload, RestRepositoryPayload } from "../collector/schemas";
import type { RepositorySource } from "../collector/sources/source";
import { NO_REPOSITORIES_MESSAGE, batchTable, lookupsPerAccount, runBatch, settingsForAccount } from "./run";

interface AccountData {
  owned?: OwnedRepositoryPayload[];
  starred?: RestRepositoryPayload[];
  error?: Error;
}

function accountSource(accounts: Record<string, AccountData>): RepositorySource {
  const lookup = (username: string | undefined) => {
    const data = accounts[username ?? ""] ?? {};
    if (data.error) {
      throw data.error;
    }
    return data;
  };
  return {
    kind: "fake",
    listOwned: async (username, limit) => {
      const owned = lookup(username).owned ?? [];
      return limit === undefined ? owned : owned.slice(0, limit);
    },
    listStarred: async (username) => lookup(username).starred ?? [],
    countBranches: async () => 2,
  };
}

describe("runBatch", () => {
  let baseDir: string;
  const settings = loadSharedSettings({}, {});

  beforeEach(async () => {
    baseDir = await fs.mkdtemp(path.join(os.tmpdir(), "inventory-batch-"));
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.remove(baseDir);
  });

  it("keeps going after an account fails", async () => {
    const source = accountSource({
      alpha: { owned: [ownedPayload({ name: "one" }), ownedPayload({ name: "two" })] },
      ghost: { error: new AuthenticationError({ argv: ["gh", "repo", "list"], stderr: "not logged in", exitCode: 4 }) },
      beta: { starred: [restRepository()] },
    });

    const summary = await runBatch([{ account: "alpha" }, { account: "ghost" }, { account: "beta" }], {
      baseDir,
      settings,
      source,
    });

    expect(summary.succeeded).toBe(2);
    expect(summary.failed).toBe(1);
    expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(["succeeded", "failed", "succeeded"]);
    expect(summary.outcomes[1].error).toContain("Authentication required");
    expect(await fs.pathExists(path.join(baseDir, "alpha", "repos.csv"))).toBe(true);
    expect(await fs.pathExists(path.join(baseDir, "beta", "starred_repos.csv"))).toBe(true);
    expect(await fs.pathExists(path.join(baseDir, "beta", "README.md"))).toBe(true);
    expect(await fs.pathExists(path.join(baseDir, "ghost"))).toBe(false);
  });

  it("counts an account without repositories as failed", async () => {
    const summary = await runBatch([{ account: "nobody" }], { baseDir, settings, source: accountSource({}) });

    expect(summary.outcomes[0]).toMatchObject({ status: "failed", error: NO_REPOSITORIES_MESSAGE, owned: 0, starred: 0 });
  });

  it("applies each account's own limit", async () => {
    const source = accountSource({
      alpha: { owned: ["a", "b", "c"].map((name) => ownedPayload({ name })) },
      beta: { owned: ["d", "e", "f"].map((name) => ownedPayload({ name })) },
    });

    const summary = await runBatch([{ account: "alpha", limit: 1 }, { account: "beta" }], { baseDir, settings, source });

    expect(summary.outcomes.map((outcome) => [outcome.limit, outcome.owned])).toEqual([
      [1, 1],
      [null, 3],
    ]);
  });

  it("reports outcomes in input order when accounts run in parallel", async () => {
    const source = accountSource({
      first: { owned: [ownedPayload()] },
      second: { error: new DataDecodeError("repository listing", "not JSON", "<html>") },
      third: { owned: [ownedPayload()] },
    });

    const summary = await runBatch([{ account: "first" }, { account: "second" }, { account: "third" }], {
      baseDir,
      settings,
      source,
      concurrency: 3,
    });

    expect(summary.outcomes.map((outcome) => outcome.account)).toEqual(["first", "second", "third"]);
    expect(summary.failed).toBe(1);
  });

  it("splits the lookup concurrency between accounts running at once", async () => {
    let inFlight = 0;
    let peak = 0;
    const source: RepositorySource = {
      ...accountSource({
        alpha: { owned: ["a", "b"].map((name) => ownedPayload({ name })) },
        beta: { owned: ["c", "d"].map((name) => ownedPayload({ name })) },
      }),
      countBranches: async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 10));
        inFlight -= 1;
        return 2;
      },
    };

    const summary = await runBatch([{ account: "alpha" }, { account: "beta" }], {
      baseDir,
      settings: loadSharedSettings({ concurrency: "2" }, {}),
      source,
      concurrency: 2,
    });

    expect(summary.succeeded).toBe(2);
    expect(peak).toBeLessThanOrEqual(2);
  });

  it("renders a summary table", async () => {
    const summary = await runBatch([{ account: "nobody", limit: 5 }], { baseDir, settings, source: accountSource({}) });

    const output = batchTable(summary);

    expect(output).toContain("nobody (limit 5)");
    expect(output).toContain(NO_REPOSITORIES_MESSAGE);
  });
});

describe("lookupsPerAccount", () => {
  it("divides the lookup budget and keeps at least one per account", () => {
    expect(lookupsPerAccount(8, 2)).toBe(4);
    expect(lookupsPerAccount(5, 2)).toBe(2);
    expect(lookupsPerAccount(2, 4)).toBe(1);
    expect(lookupsPerAccount(3, 1)).toBe(3);
  });
});

describe("settingsForAccount", () => {
  it("places every output file in a sanitized account directory", () => {
    const settings = settingsForAccount(loadSharedSettings({}, {}), "odd name", "out");

    expect(settings.username).toBe("odd name");
    expect(settings.ownedCsv).toBe(path.join("out", "odd_name", "repos.csv"));
    expect(settings.reportMd).toBe(path.join("out", "odd_name", "README.md"));
  });
});
