export type HeaderBag = Record<string, string | number | undefined>;

export interface RateLimiterOptions {
  threshold?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

function readInt(value: string | number | undefined): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return null;
}

/**
 * Tracks the GitHub API budget from `x-ratelimit-*` headers and pauses
 * callers once it drops under the threshold, until the window resets.
 */
export class RateLimiter {
  private remaining = 5000;
  private resetAt: number;
  private readonly threshold: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: RateLimiterOptions = {}) {
    this.threshold = options.threshold ?? 100;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? ((ms) => new Promise<void>((resolve) => setTimeout(resolve, ms)));
    this.resetAt = this.now() + 60_000;
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
    const seconds = Math.ceil(waitMs / 1000);
    console.log(
      `⏸️  Rate limit low (${this.remaining} remaining). Waiting ${seconds}s until ${new Date(this.resetAt).toISOString()}…`
    );
    await this.sleep(waitMs);
    return waitMs;
  }

  updateFromHeaders(headers: HeaderBag) {
    const remaining = readInt(headers["x-ratelimit-remaining"]);
    if (remaining !== null) {
      this.remaining = remaining;
    }
    const reset = readInt(headers["x-ratelimit-reset"]);
    if (reset !== null) {
      this.resetAt = reset * 1000;
    }
  }
}
