/**
 * Exponential Backoff
 *
 * delay(attempt) = min(baseDelayMs * 2^attempt, maxDelayMs) +/- jitter.
 * Capability calls are retried at the call boundary only; the control loop
 * never retries a pass.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Total attempts including the first (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0 = deterministic) */
  jitterFraction: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10000,
  maxAttempts: 3,
  jitterFraction: 0,
};

/**
 * Outcome of a bounded retry loop. `attempts` counts calls actually made.
 */
export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Delay for a zero-indexed attempt, always >= 0.
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const exponentialDelay = cfg.baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(exponentialDelay, cfg.maxDelayMs);

  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = jitterRange > 0 ? (Math.random() * 2 - 1) * jitterRange : 0;

  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function backoffSleep(
  attempt: number,
  config?: Partial<BackoffConfig>,
  label: string = 'Backoff'
): Promise<void> {
  const delay = calculateBackoffDelay(attempt, config);
  console.error(`[${label}] Attempt ${attempt + 1} failed: waiting ${delay}ms`);
  return new Promise((resolve) => setTimeout(resolve, delay));
}

/**
 * Run `fn` up to maxAttempts times. Errors failing `shouldRetry` end the loop
 * at once. Never throws: the last error is returned in the result.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>,
  label?: string
): Promise<RetryResult<T>> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const maxAttempts = Math.max(1, Math.floor(cfg.maxAttempts));
  let lastError: unknown = new Error('No attempts made');

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      const value = await fn();
      return { ok: true, value, attempts: attempt + 1 };
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) {
        return { ok: false, error, attempts: attempt + 1 };
      }
      if (attempt < maxAttempts - 1) {
        await backoffSleep(attempt, cfg, label);
      }
    }
  }

  return { ok: false, error: lastError, attempts: maxAttempts };
}

/**
 * Throwing variant of retryWithBackoff: re-throws the final error.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>,
  label?: string
): Promise<T> {
  const result = await retryWithBackoff(fn, shouldRetry, config, label);
  if (result.ok) return result.value;
  throw result.error;
}
