import { createLogger } from './logger';

const log = createLogger('Retry');

export interface RetryOptions {
  maxAttempts?: number;
  delayMs?: number;
  backoffMultiplier?: number;
}

const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  delayMs: 200,
  backoffMultiplier: 2,
};

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with bounded retries.
 * On failure, waits delayMs * (backoffMultiplier ^ attempt) then retries.
 * If isRetryable returns false for the error, no retry is attempted.
 * Throws the last error if all attempts fail.
 */
export async function withRetry<T>(
  fn: () => T | Promise<T>,
  options: RetryOptions = {},
  logContext?: string,
  isRetryable?: (error: unknown) => boolean
): Promise<T> {
  const { maxAttempts, delayMs, backoffMultiplier } = { ...DEFAULT_OPTIONS, ...options };
  let lastError: unknown;
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;
      const shouldRetry =
        attempt < maxAttempts - 1 &&
        (isRetryable == null || isRetryable(err));
      if (!shouldRetry) throw err;
      const waitMs = delayMs * Math.pow(backoffMultiplier, attempt);
      log.warn(`Retry ${attempt + 1}/${maxAttempts}`, {
        ...(logContext !== undefined && { after: logContext }),
        waitMs,
        error: err instanceof Error ? err.message : String(err),
      });
      await sleep(waitMs);
    }
  }
  throw lastError;
}
