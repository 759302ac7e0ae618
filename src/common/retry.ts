import { setTimeout as sleep } from 'node:timers/promises';

export interface RetryOptions {
  /** Attempts after the first one. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs?: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `Gave up after ${attempts} attempt(s): ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
      { cause: lastError },
    );
    this.name = 'RetryExhaustedError';
  }
}

/**
 * Exponential backoff: baseDelay * 2^attempt, capped at maxDelay.
 */
export function retryDelay(attempt: number, options: RetryOptions): number {
  const delay = options.baseDelayMs * Math.pow(2, attempt);
  return Math.min(delay, options.maxDelayMs ?? 30_000);
}

/**
 * Runs `operation` until it resolves or the retry budget is spent.
 * A non-retryable error is rethrown as-is without further attempts.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= options.maxRetries; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      if (options.isRetryable && !options.isRetryable(error)) {
        throw error;
      }
      lastError = error;

      if (attempt < options.maxRetries) {
        const delayMs = retryDelay(attempt, options);
        options.onRetry?.(attempt + 1, error, delayMs);
        if (delayMs > 0) await sleep(delayMs);
      }
    }
  }

  throw new RetryExhaustedError(options.maxRetries + 1, lastError);
}
