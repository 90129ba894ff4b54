import { describe, it, expect } from 'vitest';
import { RateLimiter } from './rate-limiter';
import { TooManyRequestsError } from './errors';

describe('RateLimiter', () => {
  it('hands out the full bucket immediately', async () => {
    const limiter = new RateLimiter({ maxRequestsPerMinute: 60, now: () => 0 });

    for (let i = 0; i < 60; i++) {
      await limiter.acquire();
    }

    expect(limiter.getWaitTime()).toBe(1000);
  });

  it('refills over time', async () => {
    let now = 0;
    const limiter = new RateLimiter({ maxRequestsPerMinute: 60, now: () => now });
    for (let i = 0; i < 60; i++) {
      await limiter.acquire();
    }

    now = 1000;

    expect(limiter.getWaitTime()).toBe(0);
  });

  it('refuses to wait longer than allowed', async () => {
    const limiter = new RateLimiter({ maxRequestsPerMinute: 2, maxWaitMs: 100, now: () => 0 });
    await limiter.acquire();
    await limiter.acquire();

    await expect(limiter.acquire()).rejects.toBeInstanceOf(TooManyRequestsError);
  });
});
