import { sleep } from "../utility.ts";

/**
 * Token bucket shared by every outgoing API request: `capacity` requests
 * may burst, refilled at `capacity / periodSeconds` tokens per second.
 */
export class TokenBucketLimiter {
  private readonly capacity: number;
  private readonly refillRatePerSec: number;
  private tokens: number;
  private last: number;

  constructor(capacity = 10, periodSeconds = 60) {
    this.capacity = Math.max(1, capacity);
    this.tokens = this.capacity;
    this.refillRatePerSec = this.capacity / Math.max(1, periodSeconds);
    this.last = Date.now();
  }

  get available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  take = async (): Promise<void> => {
    for (;;) {
      this.refill();
      if (this.tokens >= 1) {
        this.tokens -= 1;
        return;
      }
      await sleep(50);
    }
  };

  private refill(): void {
    const now = Date.now();
    const elapsed = (now - this.last) / 1000;
    this.last = now;
    this.tokens = Math.min(
      this.capacity,
      this.tokens + elapsed * this.refillRatePerSec
    );
  }
}
