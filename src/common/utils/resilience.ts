/**
 * Rate limiting for inbound webhook traffic.
 *
 * Redis holds the shared window when it is connected; the in-memory
 * sliding window takes over whenever the Redis check throws.
 */

/**
 * In-memory sliding-window rate limiter.
 * Keys whose whole window has expired are swept at most once per window.
 */
export class RateLimiter {
  private lastSweep = 0;

  constructor(
    private readonly maxRequests: number,
    private readonly windowMs: number,
    private readonly requests = new Map<string, number[]>(),
  ) {}

  /**
   * Records a request for `key` and reports whether it fits in the window.
   */
  isAllowed(key: string, now = Date.now()): boolean {
    const windowStart = now - this.windowMs;
    this.sweep(now, windowStart);

    const timestamps = (this.requests.get(key) ?? []).filter(
      (t) => t > windowStart,
    );

    if (timestamps.length >= this.maxRequests) {
      this.requests.set(key, timestamps);
      return false;
    }

    timestamps.push(now);
    this.requests.set(key, timestamps);
    return true;
  }

  private sweep(now: number, windowStart: number): void {
    if (now - this.lastSweep < this.windowMs) return;
    this.lastSweep = now;

    for (const [key, timestamps] of this.requests.entries()) {
      if (timestamps.every((t) => t <= windowStart)) {
        this.requests.delete(key);
      }
    }
  }
}

export interface AsyncRateLimiter {
  isAllowed(key: string): Promise<boolean>;
}

export interface RateLimitBackend {
  rateLimitCheck(key: string, max: number, windowMs: number): Promise<boolean>;
}

/**
 * Wraps a Redis-backed check with an in-memory fallback.
 */
export function createAsyncRateLimiter(
  backend: RateLimitBackend,
  maxRequests: number,
  windowMs: number,
): AsyncRateLimiter {
  const fallback = new RateLimiter(maxRequests, windowMs);

  return {
    async isAllowed(key: string): Promise<boolean> {
      try {
        return await backend.rateLimitCheck(key, maxRequests, windowMs);
      } catch {
        return fallback.isAllowed(key);
      }
    },
  };
}
