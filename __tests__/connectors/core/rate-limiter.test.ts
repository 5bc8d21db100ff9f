import { describe, expect, it } from "vitest";
import { TokenBucketRateLimiter } from "../../../src/connectors/core/rate-limiter.js";
import type { RateLimiterConfig } from "../../../src/connectors/core/types.js";

function setup(config: RateLimiterConfig = {}) {
  let clock = 0;
  const sleeps: number[] = [];
  const limiter = new TokenBucketRateLimiter({
    ...config,
    sleep: async (ms) => {
      sleeps.push(ms);
      clock += ms;
    },
    now: () => clock,
  });
  const advance = (ms: number): void => {
    clock += ms;
  };
  return { limiter, sleeps, advance };
}

describe("TokenBucketRateLimiter", () => {
  it("does not delay the first call", async () => {
    const { limiter, sleeps } = setup({ minDelayMs: 5_000 });
    await limiter.acquire();
    expect(sleeps).toEqual([]);
  });

  it("spaces consecutive calls by the minimum delay", async () => {
    const { limiter, sleeps, advance } = setup({ minDelayMs: 5_000 });
    await limiter.acquire();
    advance(1_000);
    await limiter.acquire();
    await limiter.acquire();
    expect(sleeps).toEqual([4_000, 5_000]);
  });

  it("does not wait once the minimum delay has passed", async () => {
    const { limiter, sleeps, advance } = setup({ minDelayMs: 5_000 });
    await limiter.acquire();
    advance(6_000);
    await limiter.acquire();
    expect(sleeps).toEqual([]);
  });

  it("backoff pauses subsequent calls", async () => {
    const { limiter, sleeps } = setup();
    limiter.backoff(100);
    await limiter.acquire();
    expect(sleeps).toEqual([100]);
  });

  it("keeps the later of two backoff deadlines", async () => {
    const { limiter, sleeps } = setup();
    limiter.backoff(100);
    limiter.backoff(10);
    await limiter.acquire();
    expect(sleeps).toEqual([100]);
  });

  it("honours x-ratelimit-retry in seconds", async () => {
    const { limiter, sleeps } = setup();
    limiter.updateFromHeaders({ "x-ratelimit-retry": "2" });
    await limiter.acquire();
    expect(sleeps).toEqual([2_000]);
  });

  it("waits for the reset when the server reports an empty bucket", async () => {
    const { limiter, sleeps } = setup();
    limiter.updateFromHeaders({
      "x-ratelimit-remaining": "0",
      "x-ratelimit-reset": "5",
    });
    await limiter.acquire();
    await limiter.acquire();
    expect(sleeps).toEqual([5_100]);
  });

  it("ignores unparseable header values", async () => {
    const { limiter, sleeps } = setup();
    limiter.updateFromHeaders({
      "x-ratelimit-remaining": "n/a",
      "x-ratelimit-retry": "soon",
    });
    await limiter.acquire();
    expect(sleeps).toEqual([]);
  });
});
