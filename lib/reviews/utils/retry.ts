/**
 * Retry with exponential backoff.
 */

export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep utility for retry delays
 */
export async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  baseDelayMs: number;
  /** Decide whether a failure is worth another attempt */
  isRetryable: (error: unknown) => boolean;
  onRetry?: (meta: { attempt: number; delayMs: number; error: unknown }) => void;
  sleep?: Sleep;
}

/**
 * Run `operation`, retrying retryable failures with delays of
 * baseDelayMs, 2*baseDelayMs, 4*baseDelayMs, ...
 * The last error is rethrown once retries are exhausted.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 1;

  for (;;) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (attempt > options.maxRetries || !options.isRetryable(error)) {
        throw error;
      }
      const delayMs = options.baseDelayMs * Math.pow(2, attempt - 1); // Exponential backoff
      options.onRetry?.({ attempt, delayMs, error });
      await wait(delayMs);
      attempt++;
    }
  }
}
