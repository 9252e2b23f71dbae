import { describe, expect, it, vi } from "vitest";

import { RateLimiter } from "./rate-limiter";

describe("RateLimiter", () => {
  const now = () => 1_700_000_000_000;

  it("does not wait while the quota is above the threshold", async () => {
    const sleep = vi.fn(async () => {});
    const limiter = new RateLimiter({ threshold: 10, sleep, now });
    limiter.updateFromHeaders({ "x-ratelimit-remaining": "11", "x-ratelimit-reset": "1700000600" });

    await expect(limiter.checkAndWait()).resolves.toBe(0);
    expect(sleep).not.toHaveBeenCalled();
  });

  it("waits until one second past the reset when the quota is low", async () => {
    const sleep = vi.fn(async () => {});
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    const limiter = new RateLimiter({ threshold: 10, sleep, now });
    limiter.updateFromHeaders({ "x-ratelimit-remaining": "3", "x-ratelimit-reset": "1700000060" });

    await expect(limiter.checkAndWait()).resolves.toBe(61_000);
    expect(sleep).toHaveBeenCalledWith(61_000);
    logSpy.mockRestore();
  });

  it("ignores headers that are missing or unparseable", () => {
    const limiter = new RateLimiter({ now });
    limiter.updateFromHeaders({ "x-ratelimit-remaining": "n/a" });

    expect(limiter.snapshot.remaining).toBe(5000);
    expect(limiter.snapshot.resetAt.getTime()).toBe(1_700_000_060_000);
  });
});
