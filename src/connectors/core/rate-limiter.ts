import { sleep as realSleep, type Sleep } from "./retry.js";
import type { RateLimiter, RateLimiterConfig } from "./types.js";

export class TokenBucketRateLimiter implements RateLimiter {
  private readonly minDelayMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  private backoffUntil = 0;
  private lastCallAt: number | null = null;

  // Allow external updates from response headers
  private remainingRequests: number | null = null;
  private resetAt: number | null = null;

  constructor(config: RateLimiterConfig = {}) {
    this.minDelayMs = config.minDelayMs ?? 0;
    this.sleep = config.sleep ?? realSleep;
    this.now = config.now ?? Date.now;
  }

  async acquire(): Promise<void> {
    // Wait for backoff (429 response)
    const now = this.now();
    if (this.backoffUntil > now) {
      await this.sleep(this.backoffUntil - now);
    }

    // Server says the bucket is empty: wait for its reset
    if (this.remainingRequests !== null && this.remainingRequests < 1) {
      if (this.resetAt !== null && this.resetAt > this.now()) {
        await this.sleep(this.resetAt - this.now() + 100);
      }
      this.remainingRequests = null;
    }

    // Enforce min delay between calls
    if (this.minDelayMs > 0 && this.lastCallAt !== null) {
      const elapsed = this.now() - this.lastCallAt;
      if (elapsed < this.minDelayMs) {
        await this.sleep(this.minDelayMs - elapsed);
      }
    }

    this.lastCallAt = this.now();
  }

  backoff(retryAfterMs: number): void {
    this.backoffUntil = Math.max(this.backoffUntil, this.now() + retryAfterMs);
  }

  updateFromHeaders(headers: Record<string, string>): void {
    const remaining = headers["x-ratelimit-remaining"];
    if (remaining !== undefined) {
      const parsed = parseInt(remaining, 10);
      this.remainingRequests = Number.isNaN(parsed) ? null : parsed;
    }

    // Seconds until the bucket refills
    const reset = headers["x-ratelimit-reset"];
    if (reset !== undefined) {
      const seconds = parseFloat(reset);
      if (!Number.isNaN(seconds)) {
        this.resetAt = this.now() + seconds * 1000;
      }
    }

    // Seconds to wait before the next request is accepted
    const retry = headers["x-ratelimit-retry"];
    if (retry !== undefined) {
      const seconds = parseFloat(retry);
      if (!Number.isNaN(seconds) && seconds > 0) {
        this.backoff(seconds * 1000);
      }
    }
  }
}

export function createRateLimiter(config: RateLimiterConfig = {}): RateLimiter {
  return new TokenBucketRateLimiter(config);
}
