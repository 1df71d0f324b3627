import type { RateLimitSnapshot } from "./types.js";

export const RATE_LIMIT_WINDOW_MS = 60_000;

export type RateLimiterOptions = {
  limit: number;
  windowMs?: number;
  now?: () => number;
};

/**
 * Fixed per-minute budget. Once exhausted, every call is refused until
 * `windowMs` after the first refused call, then the budget starts over.
 */
export class RateLimiter {
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;
  private used = 0;
  private windowStartedAt: number;
  private blockedUntil: number | null = null;

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new Error(`Rate limit must be a positive integer, got ${options.limit}`);
    }
    this.limit = options.limit;
    this.windowMs = options.windowMs ?? RATE_LIMIT_WINDOW_MS;
    this.now = options.now ?? Date.now;
    this.windowStartedAt = this.now();
  }

  /** Consumes one unit; false means the caller must not make the request. */
  tryAcquire(): boolean {
    const now = this.now();

    if (this.blockedUntil !== null) {
      if (now < this.blockedUntil) {
        return false;
      }
      this.startWindow(now);
    } else if (now - this.windowStartedAt >= this.windowMs) {
      this.startWindow(now);
    }

    if (this.used < this.limit) {
      this.used += 1;
      return true;
    }

    this.blockedUntil = now + this.windowMs;
    return false;
  }

  /** When a blocked limiter reopens, or null while calls are allowed. */
  retryAt(): number | null {
    return this.blockedUntil;
  }

  snapshot(): RateLimitSnapshot {
    return {
      limit: this.limit,
      used: this.used,
      windowStartedAt: this.windowStartedAt,
      blockedUntil: this.blockedUntil,
    };
  }

  private startWindow(now: number): void {
    this.used = 0;
    this.windowStartedAt = now;
    this.blockedUntil = null;
  }
}
