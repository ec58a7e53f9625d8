// Sliding-window limiter for outbound quote emails
import { Mutex } from 'async-mutex';
import type { RateLimitDecision, RateLimitStatus } from '../models';
import { ConfigurationError } from './error-handling';

export interface RateLimiterOptions {
  maxPerWindow: number;
  windowMs?: number;
  now?: () => number;
}

const ONE_HOUR_MS = 60 * 60 * 1000;

/**
 * Process-wide counter of recent sends. Construct one per process and inject it
 * where sends happen; the read-prune-reserve sequence runs under a mutex so that
 * concurrent submissions cannot both take the last slot.
 */
export class EmailRateLimiter {
  readonly maxPerWindow: number;
  readonly windowMs: number;
  private readonly now: () => number;
  private readonly mutex = new Mutex();
  private timestamps: number[] = [];

  constructor(options: RateLimiterOptions) {
    const { maxPerWindow, windowMs = ONE_HOUR_MS, now = Date.now } = options;

    if (!Number.isInteger(maxPerWindow) || maxPerWindow <= 0) {
      throw new ConfigurationError(`Rate limit must be a positive integer, got ${maxPerWindow}`);
    }
    if (!Number.isFinite(windowMs) || windowMs <= 0) {
      throw new ConfigurationError(`Rate limit window must be positive, got ${windowMs}`);
    }

    this.maxPerWindow = maxPerWindow;
    this.windowMs = windowMs;
    this.now = now;
  }

  /**
   * Reserves a slot before the send is attempted. A reserved slot is never refunded.
   */
  async checkAndReserve(): Promise<RateLimitDecision> {
    return this.mutex.runExclusive(() => {
      const now = this.now();
      this.prune(now);

      if (this.timestamps.length < this.maxPerWindow) {
        this.timestamps.push(now);
        return {
          allowed: true,
          remaining: this.maxPerWindow - this.timestamps.length
        };
      }

      const resetAt = this.timestamps[0] + this.windowMs;
      const retryAfterMs = Math.max(0, resetAt - now);

      return {
        allowed: false,
        remaining: 0,
        retryAfterMs,
        retryAfterMinutes: Math.max(1, Math.ceil(retryAfterMs / 60000)),
        resetAt: new Date(resetAt)
      };
    });
  }

  /**
   * Read-only view of the window; expired entries are counted out but not removed
   */
  getStatus(): RateLimitStatus {
    const cutoff = this.now() - this.windowMs;
    const used = this.timestamps.filter(timestamp => timestamp > cutoff).length;

    return {
      maxPerHour: this.maxPerWindow,
      used,
      remaining: Math.max(0, this.maxPerWindow - used)
    };
  }

  async reset(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.timestamps = [];
    });
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.timestamps.length && this.timestamps[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      this.timestamps = this.timestamps.slice(expired);
    }
  }
}
