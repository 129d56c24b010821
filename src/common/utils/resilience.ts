/**
 * Polling helpers for contended resources.
 *
 * Store requests themselves are never retried; this is only used to wait
 * for locks.
 */

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  shouldRetry?: (error: unknown) => boolean;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 100,
  maxDelayMs: 2000,
};

/**
 * Retries an async operation with exponential backoff.
 *
 * @throws The last error if all attempts fail, or the first one
 *   `shouldRetry` rejects
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;

      if (opts.shouldRetry && !opts.shouldRetry(error)) {
        throw error;
      }

      // Don't wait after the last attempt
      if (attempt < opts.maxAttempts) {
        await sleep(backoffDelay(attempt, opts));
      }
    }
  }

  throw lastError;
}

export function backoffDelay(
  attempt: number,
  opts: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs'>,
): number {
  return Math.min(opts.baseDelayMs * Math.pow(2, attempt - 1), opts.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
