/**
 * Exponential backoff retry
 */

export interface RetryOptions {
  /** Total number of attempts, including the first one */
  attempts: number;
  /** Delay before the second attempt; doubles each time */
  initialDelayMs: number;
  maxDelayMs?: number;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let delay = options.initialDelayMs;
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === attempts) {
        break;
      }
      options.onRetry?.(attempt, error, delay);
      if (delay > 0) {
        await sleep(delay);
      }
      delay = Math.min(delay * 2, options.maxDelayMs ?? Number.POSITIVE_INFINITY);
    }
  }

  throw lastError;
}
