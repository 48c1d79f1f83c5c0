import { describe, it, expect } from 'vitest';
import { exponentialBackoff, formatDelay } from '../backoff.js';

describe('exponentialBackoff', () => {
  it('should double from the initial delay up to the cap', () => {
    const backoff = exponentialBackoff({ initialDelayMs: 60_000, maxDelayMs: 3_600_000 });

    expect([1, 2, 3, 6, 7, 10].map(attempt => backoff.calculate(attempt))).toEqual([
      60_000, 120_000, 240_000, 1_920_000, 3_600_000, 3_600_000,
    ]);
  });

  it('should treat attempts below one as the first', () => {
    expect(exponentialBackoff({ initialDelayMs: 500 }).calculate(0)).toBe(500);
  });

  it('should apply equal jitter within the upper half', () => {
    const backoff = exponentialBackoff({ initialDelayMs: 1000, jitter: 'equal' }, () => 0.5);
    expect(backoff.calculate(1)).toBe(750);
  });
});

describe('formatDelay', () => {
  it('should pick a unit by magnitude', () => {
    expect(formatDelay(250)).toBe('250ms');
    expect(formatDelay(5000)).toBe('5.0s');
    expect(formatDelay(90_000)).toBe('1.5m');
  });
});
