/**
 * @description: Simple in-memory rate limiter for ledger write endpoints.
 * @ledger-scope: backend
 * @ledger-module: SimpleRateLimiter
 * @ledger-risk: low - Rate limiter failures could allow abuse but not data loss.
 * @ledger-ethics: medium - Rate limiting protects fair access and abuse prevention.
 */
// --- Types ---
type RateLimiterOptions = {
  limit: number;
  window: number;
  now?: () => number;
};

type RateLimitResult = {
  allowed: boolean;
  retryAfter: number;
};

// --- In-memory rate limiter ---
class SimpleRateLimiter {
  private readonly limit: number;
  private readonly window: number;
  private readonly now: () => number;
  private readonly requests: Map<string, number[]>;

  constructor(options: RateLimiterOptions) {
    this.limit = options.limit;
    this.window = options.window;
    this.now = options.now ?? Date.now;
    this.requests = new Map();
  }

  check(identifier: string): RateLimitResult {
    // Sliding window over timestamps; prune on each check.
    const now = this.now();
    const userRequests = this.requests.get(identifier) || [];
    const validRequests = userRequests.filter(time => now - time < this.window);

    if (validRequests.length >= this.limit) {
      // Compute retry-after in seconds based on oldest allowed timestamp.
      const oldestRequest = Math.min(...validRequests);
      const retryAfter = Math.ceil((oldestRequest + this.window - now) / 1000);
      return { allowed: false, retryAfter };
    }

    validRequests.push(now);
    this.requests.set(identifier, validRequests);

    return { allowed: true, retryAfter: 0 };
  }

  cleanup(): void {
    // Periodic sweep to drop stale identifiers.
    const now = this.now();
    for (const [identifier, requests] of this.requests.entries()) {
      const validRequests = requests.filter(time => now - time < this.window);
      if (validRequests.length === 0) {
        this.requests.delete(identifier);
      } else {
        this.requests.set(identifier, validRequests);
      }
    }
  }

  get trackedIdentifiers(): number {
    return this.requests.size;
  }
}

export { SimpleRateLimiter };
export type { RateLimiterOptions, RateLimitResult };
