/**
 * Request Spacing Rate Limiter
 * Shared by every outbound exchange call: no two calls start closer together
 * than minIntervalMs, whichever pair or operation issued them.
 * Callers reserve the next free slot and wait for it.
 */

import { TransportError } from '../../../common/errors';

export interface RateLimiterConfig {
  minIntervalMs: number; // Minimum spacing between consecutive calls
  maxQueueSize: number; // Maximum callers waiting for a slot
  maxWaitMs: number; // Reject instead of waiting longer than this
}

interface PendingSlot {
  timer: NodeJS.Timeout;
  reject: (error: Error) => void;
}

export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly maxQueueSize: number;
  private readonly maxWaitMs: number;
  private nextSlotAt = 0;
  private readonly pending = new Set<PendingSlot>();
  private stopped = false;

  constructor(config: RateLimiterConfig) {
    this.minIntervalMs = config.minIntervalMs;
    this.maxQueueSize = config.maxQueueSize;
    this.maxWaitMs = config.maxWaitMs;
  }

  /**
   * Resolve when the caller may issue its request
   */
  async acquire(): Promise<void> {
    if (this.stopped) {
      throw new TransportError('RATE_LIMITER_STOPPED');
    }

    const now = Date.now();
    const slot = Math.max(now, this.nextSlotAt);
    const delay = slot - now;

    if (delay === 0) {
      this.nextSlotAt = now + this.minIntervalMs;
      return;
    }

    if (this.pending.size >= this.maxQueueSize) {
      throw new TransportError('RATE_LIMIT_QUEUE_FULL');
    }

    if (delay > this.maxWaitMs) {
      throw new TransportError('RATE_LIMIT_QUEUE_TIMEOUT', { delayMs: delay });
    }

    this.nextSlotAt = slot + this.minIntervalMs;

    return new Promise<void>((resolve, reject) => {
      const entry: PendingSlot = {
        reject,
        timer: setTimeout(() => {
          this.pending.delete(entry);
          resolve();
        }, delay),
      };
      this.pending.add(entry);
    });
  }

  /**
   * Callers currently waiting for a slot
   */
  getQueueDepth(): number {
    return this.pending.size;
  }

  /**
   * Reject every waiting caller and refuse new ones
   */
  stop(): void {
    this.stopped = true;

    for (const entry of this.pending) {
      clearTimeout(entry.timer);
      entry.reject(new TransportError('RATE_LIMITER_STOPPED'));
    }
    this.pending.clear();
  }
}

/**
 * Default limiter for Kraken REST: one call per second
 */
export function createKrakenRateLimiter(minIntervalMs = 1000): RateLimiter {
  return new RateLimiter({
    minIntervalMs,
    maxQueueSize: 100,
    maxWaitMs: 120_000,
  });
}
