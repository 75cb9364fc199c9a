import { abortReason, CancelledError, toError } from '@eventide/core';
import type { Result } from 'neverthrow';
import { err } from 'neverthrow';

import { defaultRetryDelay, type RetryDelay, type RetryPolicy } from './retry-policy.js';

export interface RetryAttemptInfo {
  attempt: number;
  delayMs: number;
  error: Error;
}

export interface ExecuteWithRetryOptions {
  policy: RetryPolicy;
  signal?: AbortSignal | undefined;
  delay?: RetryDelay | undefined;
  onRetry?: ((info: RetryAttemptInfo) => void) | undefined;
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or has
 * been attempted maxRetries + 1 times. No delay follows the final attempt.
 *
 * A cancelled signal stops further attempts and aborts a pending backoff; the
 * result is then a CancelledError.
 */
export async function executeWithRetry<T>(
  operation: (attempt: number) => Promise<Result<T, Error>>,
  options: ExecuteWithRetryOptions
): Promise<Result<T, Error>> {
  const { policy, signal, onRetry } = options;
  const delay = options.delay ?? defaultRetryDelay;

  for (let attempt = 0; ; attempt++) {
    if (signal?.aborted) {
      return err(abortReason(signal));
    }

    const result = await operation(attempt);
    if (result.isOk()) {
      return result;
    }

    const error = result.error;
    if (attempt >= policy.maxRetries || !policy.shouldRetry(error)) {
      return result;
    }

    const delayMs = policy.getDelayMs(attempt);
    onRetry?.({ attempt, delayMs, error });

    try {
      await delay(delayMs, signal);
    } catch (waitError) {
      return err(waitError instanceof CancelledError ? waitError : toError(waitError));
    }
  }
}
