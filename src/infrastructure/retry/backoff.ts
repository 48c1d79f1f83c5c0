// ═══════════════════════════════════════════════════════════════════════════════
// BACKOFF — Delay Schedule for Delivery Retries
// ═══════════════════════════════════════════════════════════════════════════════
//
// delay(attempt) = initialDelay * multiplier^(attempt-1), capped at maxDelay.
//
// Jitter:
// - none: deterministic
// - equal: random between delay/2 and delay
//
// ═══════════════════════════════════════════════════════════════════════════════

export type JitterType = 'none' | 'equal';

export interface BackoffOptions {
  readonly initialDelayMs?: number;
  readonly maxDelayMs?: number;
  readonly multiplier?: number;
  readonly jitter?: JitterType;
}

export interface BackoffCalculator {
  /** Delay before the given attempt (1-based). */
  calculate(attempt: number): number;
}

class ExponentialBackoff implements BackoffCalculator {
  private readonly initialDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly multiplier: number;
  private readonly jitter: JitterType;

  constructor(options: BackoffOptions, private readonly random: () => number) {
    this.initialDelayMs = options.initialDelayMs ?? 1000;
    this.maxDelayMs = options.maxDelayMs ?? 30_000;
    this.multiplier = options.multiplier ?? 2;
    this.jitter = options.jitter ?? 'none';
  }

  calculate(attempt: number): number {
    const exponent = Math.max(1, attempt) - 1;
    const capped = Math.min(this.initialDelayMs * Math.pow(this.multiplier, exponent), this.maxDelayMs);
    return this.jitter === 'equal' ? capped / 2 + (this.random() * capped) / 2 : capped;
  }
}

export function exponentialBackoff(
  options: BackoffOptions = {},
  random: () => number = Math.random
): BackoffCalculator {
  return new ExponentialBackoff(options, random);
}

/**
 * Human-readable delay for log lines.
 */
export function formatDelay(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60_000).toFixed(1)}m`;
}
