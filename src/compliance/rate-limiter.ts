/**
 * In-memory per-source rate limiter for hint page fetches.
 * A single CLI invocation is the only client, so no shared store is needed.
 */
export class RateLimiter {
  private readonly lastRequest = new Map<string, number>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Resolves once at least `minDelayMs` has passed since the previous acquire for `sourceId`. */
  async acquire(sourceId: string, minDelayMs: number): Promise<void> {
    const last = this.lastRequest.get(sourceId);
    if (last !== undefined) {
      const waitMs = minDelayMs - (this.now() - last);
      if (waitMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, waitMs));
      }
    }
    this.lastRequest.set(sourceId, this.now());
  }
}

export const hintRateLimiter = new RateLimiter();
