/**
 * Central retry policy for remote calls.
 *
 * - transient (retryable): exponential backoff `min(base * 2^(attempt-1), max)`
 * - rateLimited: the platform delay capped at `maxRetryAfterMs`, or the backoff delay when none was given
 * - unauthorized, forbidden, notFound, invalidResponse and non-retryable transient: returned at once
 */
import type { ApiFailure, ApiResult, RetryPolicy } from '../../types/index.js';
import { sleep as defaultSleep } from '../../utils/helpers/index.js';
import type { RetryDeps } from './types.js';

/**
 * Backoff delay before attempt `attempt + 1`.
 */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}

/**
 * Delay before retrying after `failure`, or null when the failure must not be retried.
 */
export function getRetryDelay(failure: ApiFailure, policy: RetryPolicy, attempt: number): number | null {
  switch (failure.kind) {
    case 'transient':
      return failure.retryable ? computeBackoffDelay(policy, attempt) : null;
    case 'rateLimited':
      return failure.retryAfterMs === null
        ? computeBackoffDelay(policy, attempt)
        : Math.min(failure.retryAfterMs, policy.maxRetryAfterMs);
    case 'unauthorized':
    case 'forbidden':
    case 'notFound':
    case 'invalidResponse':
      return null;
  }
}

/**
 * Runs `operation` until it succeeds, fails with a non-retryable failure, or `maxAttempts` is spent.
 * @param label call name used in log lines
 * @returns the last result
 */
export async function executeWithRetry<T>(
  label: string,
  operation: () => Promise<ApiResult<T>>,
  deps: RetryDeps,
): Promise<ApiResult<T>> {
  const { policy, logger } = deps;
  const sleep = deps.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, policy.maxAttempts);

  let attempt = 1;
  for (;;) {
    const result = await operation();
    if (result.ok) {
      return result;
    }

    const delay = getRetryDelay(result.failure, policy, attempt);
    if (delay === null || attempt >= maxAttempts) {
      return result;
    }

    logger.warn(
      `[Retry] ${label} failed (${result.failure.kind}), attempt ${attempt}/${maxAttempts}, retrying in ${delay}ms`,
    );
    await sleep(delay);
    attempt += 1;
  }
}
