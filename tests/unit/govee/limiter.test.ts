import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { TokenBucketLimiter } from "../../../src/govee/limiter.ts";

describe("TokenBucketLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("lets a full bucket burst", async () => {
    const limiter = new TokenBucketLimiter(3, 60);

    await limiter.take();
    await limiter.take();
    await limiter.take();

    expect(limiter.available).toBe(0);
  });

  it("waits for a token to refill", async () => {
    // one token every 5 seconds
    const limiter = new TokenBucketLimiter(2, 10);
    await limiter.take();
    await limiter.take();

    let taken = false;
    const pending = limiter.take().then(() => {
      taken = true;
    });

    await vi.advanceTimersByTimeAsync(4000);
    expect(taken).toBe(false);

    await vi.advanceTimersByTimeAsync(1200);
    await pending;
    expect(taken).toBe(true);
  });

  it("never refills above capacity", async () => {
    const limiter = new TokenBucketLimiter(2, 10);
    await limiter.take();

    vi.advanceTimersByTime(60_000);

    expect(limiter.available).toBe(2);
  });
});
