/**
 * Exponential Backoff with Jitter
 *
 * Used for transient inference failures (connection refused, 5xx).
 * Delay doubles per attempt from baseDelayMs, capped at maxDelayMs, with
 * +/- jitterFraction randomness so parallel workers do not retry in lockstep.
 *
 * @module utils/backoff
 */

export interface BackoffConfig {
  /** Base delay in milliseconds (default: 500) */
  baseDelayMs: number;
  /** Maximum delay in milliseconds (default: 5000) */
  maxDelayMs: number;
  /** Total attempts including the first (default: 2) */
  maxAttempts: number;
  /** Jitter fraction +/- (default: 0.25 = +/-25%) */
  jitterFraction: number;
}

const DEFAULT_BACKOFF: BackoffConfig = {
  baseDelayMs: 500,
  maxDelayMs: 5000,
  maxAttempts: 2,
  jitterFraction: 0.25,
};

/**
 * Delay for a zero-indexed attempt: min(base * 2^attempt, max) +/- jitter, never negative.
 */
export function calculateBackoffDelay(attempt: number, config?: Partial<BackoffConfig>): number {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  const cappedDelay = Math.min(cfg.baseDelayMs * Math.pow(2, attempt), cfg.maxDelayMs);
  const jitter = (Math.random() * 2 - 1) * cappedDelay * cfg.jitterFraction;
  return Math.max(0, Math.round(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying errors that pass `shouldRetry` until maxAttempts is
 * reached. Other errors are re-thrown immediately.
 *
 * @param label - Included in the retry log line
 * @throws The last error once attempts are exhausted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (error: unknown) => boolean,
  config?: Partial<BackoffConfig>,
  label = 'operation'
): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      if (!shouldRetry(error)) throw error;
      if (attempt < cfg.maxAttempts - 1) {
        const delay = calculateBackoffDelay(attempt, cfg);
        console.error(
          `[Backoff] ${label} attempt ${attempt + 1}/${cfg.maxAttempts} failed; retrying in ${delay}ms`
        );
        await sleep(delay);
      }
    }
  }

  throw lastError;
}
