import { describe, expect, it } from 'vitest';
import { RateLimiter, backoffDelay, sleep } from '../rate-limiter.js';

describe('backoffDelay', () => {
  it('doubles from the base and caps at the maximum', () => {
    const noJitter = () => 0;
    expect([1, 2, 3, 4, 5, 6].map((attempt) => backoffDelay(attempt, 1000, 10_000, noJitter))).toEqual([
      1000, 2000, 4000, 8000, 10_000, 10_000,
    ]);
  });

  it('adds at most 20% jitter', () => {
    expect(backoffDelay(2, 1000, 30_000, () => 0.5)).toBe(2200);
    expect(backoffDelay(2, 1000, 30_000, () => 0.999)).toBe(2400);
  });
});

describe('RateLimiter', () => {
  it('spaces calls evenly across a minute', async () => {
    let now = 0;
    const waits: number[] = [];
    const limiter = new RateLimiter(
      30,
      () => now,
      async (ms) => {
        waits.push(ms);
      },
    );

    await limiter.acquire();
    await limiter.acquire();
    now = 500;
    await limiter.acquire();
    now = 10_000;
    await limiter.acquire();

    expect(waits).toEqual([2000, 3500]);
  });

  it('never waits when disabled', async () => {
    const waits: number[] = [];
    const limiter = new RateLimiter(0, () => 0, async (ms) => {
      waits.push(ms);
    });
    await limiter.acquire();
    await limiter.acquire();
    expect(waits).toEqual([]);
  });
});

describe('sleep', () => {
  it('returns early when aborted', async () => {
    const controller = new AbortController();
    const started = Date.now();
    const sleeping = sleep(60_000, controller.signal);
    controller.abort();
    await sleeping;
    expect(Date.now() - started).toBeLessThan(5000);
  });
});
