/**
 * Exponential Backoff with Jitter
 *
 * Delay doubles each attempt (500ms, 1s, 2s, … capped at maxDelayMs) with
 * +/- jitterFraction randomness.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 10000) */
  maxDelayMs: number;
  /** Total attempts including the first one (default: 3) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
  /** Waits between attempts; replaced in tests */
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 10000,
  maxAttempts: 3,
  jitterFraction: 0.25,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

/**
 * Calculate delay for a given attempt (0-indexed) with jitter.
 *
 * Formula: min(baseDelay * 2^attempt, maxDelay) +/- jitter
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitterRange = cappedDelay * cfg.jitterFraction;
  const jitter = (Math.random() * 2 - 1) * jitterRange;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

/**
 * Execute a function with automatic retry and exponential backoff.
 * Errors rejected by shouldRetry are re-thrown immediately.
 *
 * @throws The last error if all attempts fail
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        console.error(`[Backoff] Attempt ${attempt + 1} failed, retrying in ${delay}ms`);
        await cfg.sleep(delay);
      }
    }
  }

  throw lastError;
}
