/**
 * Backoff delay and retry loop
 *
 * @see src/utils/backoff.ts
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { calculateBackoffDelay, withRetry } from '../../../src/utils/backoff.js';

const NO_DELAY = { baseDelayMs: 0, maxDelayMs: 0 };

describe('calculateBackoffDelay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('doubles per attempt up to the cap', () => {
    const config = { baseDelayMs: 100, maxDelayMs: 1000, jitterFraction: 0 };
    expect([0, 1, 2, 3, 4, 5].map((attempt) => calculateBackoffDelay(attempt, config))).toEqual([
      100, 200, 400, 800, 1000, 1000,
    ]);
  });

  it('applies jitter within the configured fraction', () => {
    vi.spyOn(Math, 'random').mockReturnValue(1);
    expect(calculateBackoffDelay(0, { baseDelayMs: 1000, jitterFraction: 0.25 })).toBe(1250);

    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(calculateBackoffDelay(0, { baseDelayMs: 1000, jitterFraction: 0.25 })).toBe(750);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error('busy')).mockResolvedValueOnce('done');

    await expect(withRetry(fn, () => true, { ...NO_DELAY, maxAttempts: 3 })).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('rethrows a non-retryable error at once', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('bad request'));

    await expect(withRetry(fn, () => false, { ...NO_DELAY, maxAttempts: 3 })).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('throws the last error when attempts run out', async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(withRetry(fn, () => true, { ...NO_DELAY, maxAttempts: 2 })).rejects.toThrow('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops retrying once the signal aborts', async () => {
    const controller = new AbortController();
    const fn = vi.fn().mockImplementation(async () => {
      controller.abort();
      throw new Error('interrupted');
    });

    await expect(
      withRetry(fn, () => true, { ...NO_DELAY, maxAttempts: 5, signal: controller.signal })
    ).rejects.toThrow('interrupted');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
