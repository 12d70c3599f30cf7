/**
 * Rate limiting for provider API calls.
 *
 * @module providers/rate-limiter
 */

import { sleep as defaultSleep } from './retry.js';

/**
 * Statistics about the current state of the RateLimiter.
 */
export interface RateLimiterStats {
  /** Number of slots handed out so far */
  acquired: number;
  /** Total time spent waiting for slots, in milliseconds */
  waitedMs: number;
  /** Minimum spacing between calls, in milliseconds */
  minIntervalMs: number;
}

/**
 * Clock and sleep hooks, replaceable in tests.
 */
export interface RateLimiterHooks {
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * RateLimiter enforces a minimum delay between consecutive calls to one
 * provider.
 *
 * Slots are reserved synchronously, so callers that race still get spaced
 * `minIntervalMs` apart in call order.
 *
 * @example
 * ```typescript
 * const limiter = new RateLimiter(200); // at most one call every 200ms
 *
 * const page = await limiter.run(() => fetch(url));
 * ```
 */
export class RateLimiter {
  private readonly minIntervalMs: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  /** Earliest timestamp the next slot may start at */
  private nextSlotAt = 0;

  private acquired = 0;
  private waitedMs = 0;

  /**
   * Creates a new RateLimiter.
   *
   * @param minIntervalMs - Minimum spacing between calls
   * @param hooks - Optional clock/sleep overrides
   * @throws Error if minIntervalMs is negative or not finite
   */
  constructor(minIntervalMs: number, hooks: RateLimiterHooks = {}) {
    if (!Number.isFinite(minIntervalMs) || minIntervalMs < 0) {
      throw new Error('Rate limit interval must be a non-negative number');
    }
    this.minIntervalMs = minIntervalMs;
    this.now = hooks.now ?? Date.now;
    this.sleep = hooks.sleep ?? defaultSleep;
  }

  /**
   * Waits until the next slot is available and claims it.
   */
  async acquire(): Promise<void> {
    const now = this.now();
    const startAt = Math.max(now, this.nextSlotAt);
    this.nextSlotAt = startAt + this.minIntervalMs;
    this.acquired++;

    const wait = startAt - now;
    if (wait > 0) {
      this.waitedMs += wait;
      await this.sleep(wait);
    }
  }

  /**
   * Executes a function once a slot is available.
   *
   * @param fn - Async function consuming one slot
   * @returns The function's result
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    return fn();
  }

  /**
   * Gets current statistics about the limiter state.
   */
  getStats(): RateLimiterStats {
    return {
      acquired: this.acquired,
      waitedMs: this.waitedMs,
      minIntervalMs: this.minIntervalMs,
    };
  }
}
