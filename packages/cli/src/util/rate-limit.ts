import { sleep } from "./retry.js";

/**
 * Spaces calls at least `minIntervalMs` apart. Callers queue in order.
 */
export class RateLimiter {
  private next = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly now: () => number = Date.now
  ) {}

  async acquire(signal?: AbortSignal): Promise<void> {
    const current = this.now();
    const slot = Math.max(current, this.next);
    this.next = slot + this.minIntervalMs;
    if (slot > current) {
      await sleep(slot - current, signal);
    }
  }
}
