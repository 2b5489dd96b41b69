import { CancelledError } from '../errors';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((r) => setTimeout(r, ms));

/**
 * Spaces out calls to one external API. A single instance is shared by every
 * fetch in every cycle, so the spacing holds no matter how many accounts run
 * in parallel.
 */
export class RateLimiter {
  private nextSlot = 0;

  constructor(
    private readonly minIntervalMs: number,
    private readonly wait: Sleep = sleep,
    private readonly now: () => number = Date.now,
  ) {}

  // Reserves the next free slot synchronously, then waits for it. A caller
  // whose signal fired while it waited gets a CancelledError instead of the slot.
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) throw new CancelledError();
    const current = this.now();
    const slot = Math.max(current, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;
    const delay = slot - current;
    if (delay > 0) await this.wait(delay);
    if (signal?.aborted) throw new CancelledError();
  }

  // Pushes every pending caller back, e.g. after the API answered 429.
  penalize(ms: number): void {
    this.nextSlot = Math.max(this.nextSlot, this.now() + ms);
  }
}
