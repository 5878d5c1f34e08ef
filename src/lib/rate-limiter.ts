/**
 * Matchflow — Token Bucket Rate Limiter
 *
 * At most `ratePerSecond` acquisitions per second once the initial burst
 * (`capacity`) is spent. Waiters are served in arrival order.
 */

import { defaultSleep, type Sleep } from './retry';
import { SerialQueue } from './serial';

export interface Clock {
  now(): number;
  sleep: Sleep;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: defaultSleep,
};

export interface TokenBucketOptions {
  ratePerSecond: number;
  /** Burst size, default 1 */
  capacity?: number;
}

export class TokenBucket {
  readonly ratePerSecond: number;
  readonly capacity: number;

  private tokens: number;
  private lastRefill: number;
  private readonly clock: Clock;
  private readonly queue = new SerialQueue();

  constructor(options: TokenBucketOptions, clock: Clock = systemClock) {
    if (!(options.ratePerSecond > 0)) {
      throw new RangeError(`ratePerSecond must be positive, got ${options.ratePerSecond}`);
    }
    this.ratePerSecond = options.ratePerSecond;
    this.capacity = Math.max(1, options.capacity ?? 1);
    this.clock = clock;
    this.tokens = this.capacity;
    this.lastRefill = clock.now();
  }

  /**
   * Take one token, sleeping until one is available.
   * Resolves with the number of milliseconds spent waiting.
   */
  acquire(): Promise<number> {
    return this.queue.run(() => this.take());
  }

  /** Tokens currently available (after refill). */
  available(): number {
    this.refill();
    return this.tokens;
  }

  private async take(): Promise<number> {
    this.refill();

    if (this.tokens >= 1) {
      this.tokens -= 1;
      return 0;
    }

    const waitMs = Math.ceil(((1 - this.tokens) * 1000) / this.ratePerSecond);
    await this.clock.sleep(waitMs);

    this.refill();
    this.tokens = Math.max(0, this.tokens - 1);
    return waitMs;
  }

  private refill(): void {
    const now = this.clock.now();
    const elapsedMs = Math.max(0, now - this.lastRefill);
    this.tokens = Math.min(this.capacity, this.tokens + (elapsedMs * this.ratePerSecond) / 1000);
    this.lastRefill = now;
  }
}
