/**
 * Minimum-interval rate limiter.
 *
 * One instance is shared by every caller that talks to the same host,
 * so the interval holds across all workers.
 */

import { sleep as defaultSleep, type Sleep } from "./retry";

export class RateLimiter {
  private nextSlotAt = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly clock: () => number = () => Date.now(),
    private readonly sleep: Sleep = defaultSleep
  ) {}

  /**
   * Wait until the caller may issue its request.
   * Slots are reserved synchronously, so concurrent callers queue up
   * one interval apart.
   */
  async acquire(): Promise<void> {
    const now = this.clock();
    const slot = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = slot + this.minIntervalMs;

    const waitMs = slot - now;
    if (waitMs > 0) {
      await this.sleep(waitMs);
    }
  }
}
