/**
 * Tests for the token bucket rate limiter
 */

import { describe, it, expect } from 'vitest';
import { TokenBucket } from '../../src/lib/rate-limiter';
import { createFakeClock } from '../helpers/fixtures';

describe('TokenBucket', () => {
  it('should let the first call through without waiting', async () => {
    const clock = createFakeClock();
    const bucket = new TokenBucket({ ratePerSecond: 2 }, clock);

    await expect(bucket.acquire()).resolves.toBe(0);
    expect(clock.sleeps).toEqual([]);
  });

  it('should space further calls by 1000 / rate ms', async () => {
    const clock = createFakeClock();
    const bucket = new TokenBucket({ ratePerSecond: 2 }, clock);

    const waits = [await bucket.acquire(), await bucket.acquire(), await bucket.acquire()];

    expect(waits).toEqual([0, 500, 500]);
    expect(clock.now()).toBe(1000);
  });

  it('should serve concurrent callers in order', async () => {
    const clock = createFakeClock();
    const bucket = new TokenBucket({ ratePerSecond: 4 }, clock);

    const waits = await Promise.all([bucket.acquire(), bucket.acquire(), bucket.acquire()]);

    expect(waits).toEqual([0, 250, 250]);
    expect(clock.sleeps).toEqual([250, 250]);
  });

  it('should refill after idle time', async () => {
    const clock = createFakeClock();
    const bucket = new TokenBucket({ ratePerSecond: 2 }, clock);

    await bucket.acquire();
    clock.advance(1000);

    await expect(bucket.acquire()).resolves.toBe(0);
  });

  it('should allow a burst up to capacity', async () => {
    const clock = createFakeClock();
    const bucket = new TokenBucket({ ratePerSecond: 1, capacity: 3 }, clock);

    const waits = [await bucket.acquire(), await bucket.acquire(), await bucket.acquire(), await bucket.acquire()];

    expect(waits).toEqual([0, 0, 0, 1000]);
  });

  it('should reject a non-positive rate', () => {
    expect(() => new TokenBucket({ ratePerSecond: 0 })).toThrow(RangeError);
  });
});
