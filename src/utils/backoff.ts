/**
 * Exponential Backoff with Jitter
 *
 * Delay doubles per attempt from baseDelayMs, capped at maxDelayMs, with
 * +/- jitterFraction randomness so parallel workers do not retry in lockstep.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs: number;
  /** Maximum number of attempts, including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25) */
  jitterFraction: number;
  /** Stops further retries once aborted */
  signal?: AbortSignal;
  /** Log tag, e.g. 'OcrEngine' */
  label?: string;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  maxAttempts: 3,
  jitterFraction: 0.25,
};

/**
 * Delay for a zero-indexed attempt: min(base * 2^attempt, max) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Sleep for the backoff duration. Resolves early if the signal aborts.
 */
export function backoffSleep(attempt: number, config?: Partial<BackoffConfig>): Promise<void> {
  const delay = calculateBackoffDelay(attempt, config);
  const tag = config?.label ?? 'Backoff';
  console.error(`[${tag}] Attempt ${attempt + 1}: waiting ${delay}ms`);

  return new Promise((resolve) => {
    const signal = config?.signal;
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, delay);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Execute `fn`, retrying errors that pass `shouldRetry` up to maxAttempts.
 * Non-retryable errors, and any error after the signal aborts, are rethrown
 * immediately.
 *
 * @throws The last error if all attempts fail
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error) || cfg.signal?.aborted) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        await backoffSleep(attempt, cfg);
      }
    }
  }

  throw lastError;
}
