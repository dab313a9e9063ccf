// Network retry utilities

import pRetry from 'p-retry';
import { isRetriableError } from '@/errors';

export interface RetryOptions {
  /** Total attempts, first one included */
  maxAttempts?: number;
  baseDelay?: number;
  maxDelay?: number;
  /** 1 gives a fixed backoff */
  factor?: number;
  randomize?: boolean;
  onRetry?: (attempt: number, error: unknown, nextDelay: number) => void;
  shouldRetry?: (error: unknown) => boolean;
  signal?: AbortSignal;
}

/**
 * Executes a function with retry logic on top of p-retry.
 * Errors rejected by `shouldRetry` are rethrown at once, unchanged.
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelay = 2000,
    maxDelay = 60000,
    factor = 2,
    randomize = false,
    onRetry,
    shouldRetry = isRetriableError,
    signal,
  } = options;

  return pRetry(
    async (attemptNumber) => {
      signal?.throwIfAborted();
      return operation(attemptNumber);
    },
    {
      retries: Math.max(0, maxAttempts - 1),
      minTimeout: baseDelay,
      maxTimeout: Math.max(baseDelay, maxDelay),
      factor,
      randomize,
      signal,
      onFailedAttempt: (context) => {
        // p-retry 7.x passes a context object {error, attemptNumber, retriesLeft, ...}
        const actualError = context.error;

        if (!shouldRetry(actualError)) {
          throw actualError;
        }

        if (context.retriesLeft > 0) {
          const nextDelay = Math.min(baseDelay * factor ** (context.attemptNumber - 1), maxDelay);
          onRetry?.(context.attemptNumber, actualError, nextDelay);
        }
      },
    },
  );
}
