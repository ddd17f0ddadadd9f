import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Spaces request starts at least `1 / requestsPerSecond` apart, across every
 * caller sharing the instance.
 */
export class RateLimiter {
  private readonly intervalMs: number;
  private nextSlot = 0;

  constructor(
    requestsPerSecond: number,
    private readonly now: () => number = Date.now
  ) {
    this.intervalMs = requestsPerSecond > 0 ? 1000 / requestsPerSecond : 0;
  }

  get enabled(): boolean {
    return this.intervalMs > 0;
  }

  /** Reserve the next slot and wait for it. */
  async acquire(): Promise<void> {
    if (!this.enabled) return;
    const current = this.now();
    const slot = Math.max(current, this.nextSlot);
    this.nextSlot = slot + this.intervalMs;
    const wait = slot - current;
    if (wait > 0) await sleep(wait);
  }
}
