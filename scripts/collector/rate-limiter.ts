import type { ResponseHeaders } from "@octokit/types";

export interface RateLimiterOptions {
  /** Pause once fewer than this many requests remain in the window. */
  threshold?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function readInteger(value: string | number | undefined): number | null {
  if (typeof value === "number") {
    return value;
  }
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/** Tracks the REST API quota from response headers and waits out the window when it runs low. */
export class RateLimiter {
  private remaining = 5000;
  private resetAt: number;
  private readonly threshold: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;

  constructor({ threshold = 100, sleep = defaultSleep, now = Date.now }: RateLimiterOptions = {}) {
    this.threshold = threshold;
    this.sleep = sleep;
    this.now = now;
    this.resetAt = now() + 60_000;
  }

  get snapshot(): { remaining: number; resetAt: Date } {
    return { remaining: this.remaining, resetAt: new Date(this.resetAt) };
  }

  async checkAndWait(): Promise<number> {
    const now = this.now();
    if (this.remaining > this.threshold || this.resetAt <= now) {
      return 0;
    }
    const waitMs = this.resetAt - now + 1000;
    console.log(
      `⏸️  Rate limit low (${this.remaining} remaining). Waiting ${Math.ceil(waitMs / 1000)}s until ${new Date(this.resetAt).toISOString()}…`
    );
    await this.sleep(waitMs);
    return waitMs;
  }

  updateFromHeaders(headers: ResponseHeaders) {
    const remaining = readInteger(headers["x-ratelimit-remaining"]);
    if (remaining !== null) {
      this.remaining = remaining;
    }
    const reset = readInteger(headers["x-ratelimit-reset"]);
    if (reset !== null) {
      this.resetAt = reset * 1000;
    }
  }
}
