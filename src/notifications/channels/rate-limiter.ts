// ═══════════════════════════════════════════════════════════════════════════════
// TOKEN BUCKET — Outbound Send Rate per Channel
// ═══════════════════════════════════════════════════════════════════════════════

export interface TokenBucketConfig {
  /** Bucket size; also the burst allowance */
  capacity: number;
  /** Tokens added per second */
  refillRate: number;
}

export interface TakeResult {
  allowed: boolean;
  /** Time until the next token is available; 0 when allowed */
  retryAfterMs: number;
}

/**
 * In-process bucket. Starts full and refills continuously.
 */
export class TokenBucket {
  private tokens: number;
  private lastRefill: number;

  constructor(
    private readonly config: TokenBucketConfig,
    private readonly now: () => number = Date.now
  ) {
    this.tokens = config.capacity;
    this.lastRefill = now();
  }

  tryTake(count = 1): TakeResult {
    this.refill();

    if (this.tokens >= count) {
      this.tokens -= count;
      return { allowed: true, retryAfterMs: 0 };
    }

    const missing = count - this.tokens;
    return { allowed: false, retryAfterMs: Math.ceil((missing / this.config.refillRate) * 1000) };
  }

  available(): number {
    this.refill();
    return Math.floor(this.tokens);
  }

  private refill(): void {
    const current = this.now();
    const elapsedMs = current - this.lastRefill;
    if (elapsedMs <= 0) return;

    this.tokens = Math.min(this.config.capacity, this.tokens + (elapsedMs / 1000) * this.config.refillRate);
    this.lastRefill = current;
  }
}
