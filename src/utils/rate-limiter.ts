/**
 * Minimum-interval rate limiter
 *
 * Each job owns one by default; a single instance can be shared between jobs
 * to put every content-source call under one budget.
 */

import { sleep } from './retry.js';

export class RateLimiter {
  private lastCallTime = 0;
  private queue: Promise<void> = Promise.resolve();

  constructor(private readonly minIntervalMs: number) {}

  async waitForSlot(): Promise<void> {
    // Serialize callers so concurrent jobs sharing a limiter cannot claim the same slot
    const turn = this.queue.then(() => this.reserve());
    this.queue = turn;
    return turn;
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    await this.waitForSlot();
    return fn();
  }

  private async reserve(): Promise<void> {
    if (this.minIntervalMs <= 0) {
      return;
    }

    const now = Date.now();
    const timeSinceLastCall = now - this.lastCallTime;
    const waitTime = Math.max(0, this.minIntervalMs - timeSinceLastCall);

    if (waitTime > 0) {
      await sleep(waitTime);
    }

    this.lastCallTime = Date.now();
  }
}
