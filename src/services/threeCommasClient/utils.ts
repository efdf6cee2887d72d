import type { ApiFailure } from '../../types/index.js';

/**
 * Failure of a call skipped because its listing budget ran out. Never retried.
 */
export function createAbandonedFailure(): ApiFailure {
  return { kind: 'transient', cause: 'listing abandoned, budget exhausted', retryable: false };
}
