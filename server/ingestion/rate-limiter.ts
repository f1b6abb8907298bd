import { setTimeout as delay } from "timers/promises";

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = async (ms) => {
  await delay(ms);
};

/**
 * Spaces request starts at least `minIntervalMs` apart, across every caller
 * sharing the instance.
 */
export class RateLimiter {
  private nextSlot = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly wait: Sleep = sleep,
    private readonly now: () => number = Date.now,
  ) {}

  async acquire(): Promise<void> {
    const current = this.now();
    const slot = Math.max(current, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    const waitMs = slot - current;
    if (waitMs > 0) {
      await this.wait(waitMs);
    }
  }
}
