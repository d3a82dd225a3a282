/**
 * Unit tests for exponential backoff
 */

import { describe, it, expect, vi } from 'vitest';

import { calculateBackoffDelay, retryWithBackoff, withRetry } from '../../../src/utils/backoff.js';

describe('calculateBackoffDelay', () => {
  it('doubles per attempt from the base', () => {
    expect(calculateBackoffDelay(0)).toBe(500);
    expect(calculateBackoffDelay(1)).toBe(1000);
    expect(calculateBackoffDelay(3)).toBe(4000);
  });

  it('caps at maxDelayMs', () => {
    expect(calculateBackoffDelay(10)).toBe(10000);
    expect(calculateBackoffDelay(2, { baseDelayMs: 100, maxDelayMs: 250 })).toBe(250);
  });

  it('stays within the jitter band', () => {
    for (let i = 0; i < 20; i++) {
      const delay = calculateBackoffDelay(1, { jitterFraction: 0.25 });
      expect(delay).toBeGreaterThanOrEqual(750);
      expect(delay).toBeLessThanOrEqual(1250);
    }
  });
});

describe('retryWithBackoff', () => {
  const fast = { baseDelayMs: 0, maxAttempts: 3 };

  it('returns the first success with the attempt count', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('done');

    await expect(retryWithBackoff(fn, () => true, fast)).resolves.toEqual({ ok: true, value: 'done', attempts: 3 });
  });

  it('stops at the first error that should not be retried', async () => {
    const error = new Error('fatal');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(retryWithBackoff(fn, () => false, fast)).resolves.toEqual({ ok: false, error, attempts: 1 });
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('returns the last error once attempts run out', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('still down'));
    const result = await retryWithBackoff(fn, () => true, fast);

    expect(result.ok).toBe(false);
    expect(result.attempts).toBe(3);
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('withRetry', () => {
  it('rethrows the final error', async () => {
    const fn = vi.fn<() => Promise<number>>().mockRejectedValue(new Error('gone'));
    await expect(withRetry(fn, () => true, { baseDelayMs: 0, maxAttempts: 2 })).rejects.toThrow('gone');
    expect(fn).toHaveBeenCalledTimes(2);
  });
});
