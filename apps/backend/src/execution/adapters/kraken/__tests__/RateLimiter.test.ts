/**
 * Rate Limiter Tests
 * Minimum spacing between outbound exchange calls
 */

import { RateLimiter } from '../RateLimiter';

describe('RateLimiter', () => {
  let rateLimiter: RateLimiter;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2024-01-01T00:00:00Z'));
    rateLimiter = new RateLimiter({
      minIntervalMs: 1000,
      maxQueueSize: 2,
      maxWaitMs: 5000,
    });
  });

  afterEach(() => {
    rateLimiter.stop();
    jest.useRealTimers();
  });

  it('should allow the first call immediately', async () => {
    await expect(rateLimiter.acquire()).resolves.toBeUndefined();
    expect(rateLimiter.getQueueDepth()).toBe(0);
  });

  it('should hold the next call until the spacing has elapsed', async () => {
    await rateLimiter.acquire();

    let released = false;
    const second = rateLimiter.acquire().then(() => {
      released = true;
    });
    expect(rateLimiter.getQueueDepth()).toBe(1);

    jest.advanceTimersByTime(999);
    await Promise.resolve();
    expect(released).toBe(false);

    jest.advanceTimersByTime(1);
    await second;
    expect(released).toBe(true);
    expect(rateLimiter.getQueueDepth()).toBe(0);
  });

  it('should space queued callers one interval apart', async () => {
    await rateLimiter.acquire();
    const releases: number[] = [];
    const start = Date.now();

    const second = rateLimiter.acquire().then(() => releases.push(Date.now() - start));
    const third = rateLimiter.acquire().then(() => releases.push(Date.now() - start));

    await jest.advanceTimersByTimeAsync(2000);
    await Promise.all([second, third]);

    expect(releases).toEqual([1000, 2000]);
  });

  it('should not delay a call issued after the interval has passed', async () => {
    await rateLimiter.acquire();
    jest.advanceTimersByTime(1500);

    await rateLimiter.acquire();

    expect(rateLimiter.getQueueDepth()).toBe(0);
  });

  it('should reject when the queue is full', async () => {
    await rateLimiter.acquire();
    const waiting = [rateLimiter.acquire(), rateLimiter.acquire()];

    await expect(rateLimiter.acquire()).rejects.toThrow('RATE_LIMIT_QUEUE_FULL');

    await jest.advanceTimersByTimeAsync(2000);
    await Promise.all(waiting);
  });

  it('should reject a wait longer than maxWaitMs', async () => {
    const limiter = new RateLimiter({ minIntervalMs: 3000, maxQueueSize: 10, maxWaitMs: 5000 });
    await limiter.acquire();
    const second = limiter.acquire();

    await expect(limiter.acquire()).rejects.toThrow('RATE_LIMIT_QUEUE_TIMEOUT');

    await jest.advanceTimersByTimeAsync(3000);
    await second;
    limiter.stop();
  });

  it('should reject waiting callers when stopped', async () => {
    await rateLimiter.acquire();
    const waiting = rateLimiter.acquire();

    rateLimiter.stop();

    await expect(waiting).rejects.toThrow('RATE_LIMITER_STOPPED');
    await expect(rateLimiter.acquire()).rejects.toThrow('RATE_LIMITER_STOPPED');
  });
});
