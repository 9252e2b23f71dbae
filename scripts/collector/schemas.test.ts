import { describe, expect, it } from "vitest";

import { DataDecodeError } from "./errors";
import { ownedPayload, restRepository } from "./__fixtures__/payloads";
import { parseBranchCount, parseOwnedRepositories, parseRestRepositories } from "./schemas";

describe("parseOwnedRepositories", () => {
  it("treats empty output as no repositories", () => {
    expect(parseOwnedRepositories(null)).toEqual([]);
  });

  it("keeps listing entries and drops fields it does not use", () => {
    const [repo] = parseOwnedRepositories([{ ...ownedPayload(), stargazerCount: 3 }]);

    expect(repo).toEqual(ownedPayload());
  });

  it("rejects an entry without a name", () => {
    expect(() => parseOwnedRepositories([{ description: "nameless" }])).toThrow(DataDecodeError);
  });

  it("rejects output that is not a list", () => {
    expect(() => parseOwnedRepositories({ message: "Not Found" })).toThrow(DataDecodeError);
  });
});

describe("parseRestRepositories", () => {
  it("flattens slurped pages in order", () => {
    const pages = [[restRepository({ name: "one" }), restRepository({ name: "two" })], [restRepository({ name: "three" })]];

    expect(parseRestRepositories(pages).map((repo) => repo.name)).toEqual(["one", "two", "three"]);
  });

  it("unwraps entries that carry their star date", () => {
    const [repo] = parseRestRepositories([[{ starred_at: "2024-01-01T00:00:00Z", repo: restRepository() }]]);

    expect(repo.full_name).toBe("acme/gadgets");
  });

  it("names the operation in decode failures", () => {
    expect(() => parseRestRepositories([["not a repository"]], "owned repository listing")).toThrow(
      "Could not decode owned repository listing"
    );
  });
});

describe("parseBranchCount", () => {
  it("accepts a single count", () => {
    expect(parseBranchCount(7)).toBe(7);
  });

  it("sums one count per page", () => {
    expect(parseBranchCount([100, 5])).toBe(105);
  });

  it("counts the entries of a branch list", () => {
    expect(parseBranchCount([[{ name: "main" }, { name: "dev" }]])).toBe(2);
  });

  it("rejects anything else", () => {
    expect(() => parseBranchCount("seven")).toThrow(DataDecodeError);
    expect(() => parseBranchCount(-1)).toThrow(DataDecodeError);
  });
});
