import { isRetryable } from './errors.js';

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export function backoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs = 30_000,
): number {
  return Math.min(baseDelayMs * 2 ** (attempt - 1), maxDelayMs);
}

/**
 * Runs `task` until it succeeds, the error is not retryable, or
 * `maxAttempts` is used up. The last error is rethrown unchanged.
 */
export async function retryWithBackoff<T>(
  task: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await task(attempt);
    } catch (error) {
      if (attempt >= options.maxAttempts || !shouldRetry(error)) {
        throw error;
      }
      const delayMs = backoffDelay(
        attempt,
        options.baseDelayMs,
        options.maxDelayMs,
      );
      options.onRetry?.(error, attempt, delayMs);
      await sleep(delayMs);
    }
  }
}
