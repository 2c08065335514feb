/**
 * Fixed-window attempt counter for authentication endpoints
 * @module auth/rate-limit
 */

import type { Clock } from '../context/index.js';

interface Window {
  count: number;
  resetAt: number;
}

export interface RateLimiterOptions {
  max: number;
  windowMs: number;
  clock?: Clock;
}

/**
 * In-memory limiter keyed by client address. Expired windows are pruned
 * lazily on each check, so no timer keeps the process alive.
 */
export class RateLimiter {
  private windows = new Map<string, Window>();
  private max: number;
  private windowMs: number;
  private clock: Clock;

  constructor(options: RateLimiterOptions) {
    this.max = options.max;
    this.windowMs = options.windowMs;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Count an attempt. Returns false once the key is over its limit.
   */
  attempt(key: string): boolean {
    const now = this.clock().getTime();
    this.prune(now);

    const window = this.windows.get(key);
    if (!window) {
      this.windows.set(key, { count: 1, resetAt: now + this.windowMs });
      return true;
    }
    if (window.count >= this.max) {
      return false;
    }
    window.count += 1;
    return true;
  }

  reset(): void {
    this.windows.clear();
  }

  private prune(now: number): void {
    for (const [key, window] of this.windows) {
      if (window.resetAt <= now) {
        this.windows.delete(key);
      }
    }
  }
}
