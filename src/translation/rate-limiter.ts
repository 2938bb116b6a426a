import { sleep as defaultSleep, type SleepFn } from './retry.js';

/**
 * Hands out request slots evenly spaced over a minute. Workers reserve
 * the next free slot and wait for it; 0 requests per minute disables it.
 */
export class RateLimiter {
  private readonly interval: number;
  private nextSlot = 0;

  constructor(
    readonly requestsPerMinute: number,
    private readonly now: () => number = Date.now,
    private readonly sleep: SleepFn = defaultSleep
  ) {
    this.interval = requestsPerMinute > 0 ? 60000 / requestsPerMinute : 0;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (this.interval <= 0) return;

    const current = this.now();
    const slot = Math.max(this.nextSlot, current);
    this.nextSlot = slot + this.interval;

    const wait = slot - current;
    if (wait > 0) {
      if (wait >= 1000) console.debug(`Rate limit (${this.requestsPerMinute}/min): waiting ${(wait / 1000).toFixed(2)}s`);
      await this.sleep(wait, signal);
    }
  }
}
