import type { ApiFailure, ApiResult, Deal, DealListing, Target } from '../../types/index.js';
import { formatError } from '../../utils/error/index.js';
import type { TargetBudget, TargetFetch } from './types.js';

/**
 * Stable key of a target, e.g. `bot:42`.
 */
export function buildTargetKey(target: Target): string {
  return `${target.kind}:${target.id}`;
}

/**
 * Failure recorded for a target whose fetch exceeded its budget.
 */
export function createTargetTimeoutFailure(timeoutMs: number): ApiFailure {
  return { kind: 'transient', cause: `target timed out after ${timeoutMs}ms`, retryable: false };
}

/**
 * Failure recorded when a client call throws instead of returning a result.
 */
export function createUnexpectedFailure(err: unknown): ApiFailure {
  return { kind: 'transient', cause: `unexpected error: ${formatError(err)}`, retryable: false };
}

/**
 * Starts the time budget of one target listing.
 *
 * The budget only runs while the target does its own work: the client pauses it for the time a
 * call waits behind other targets at the rate limiter. On expiry the signal aborts and `onExpire`
 * runs once. Wall time is used because the budget drives a real timer.
 */
export function createTargetBudget(timeoutMs: number, onExpire: () => void): TargetBudget {
  const controller = new AbortController();
  let remainingMs = timeoutMs;
  let runningSince: number | null = null;
  let timer: NodeJS.Timeout | null = null;
  let pauseDepth = 0;
  let disposed = false;

  const start = (): void => {
    runningSince = Date.now();
    timer = setTimeout(() => {
      timer = null;
      runningSince = null;
      remainingMs = 0;
      controller.abort();
      onExpire();
    }, Math.max(0, remainingMs));
  };

  const halt = (): void => {
    if (timer === null || runningSince === null) {
      return;
    }
    clearTimeout(timer);
    remainingMs -= Date.now() - runningSince;
    timer = null;
    runningSince = null;
  };

  start();

  return {
    signal: controller.signal,
    pause: () => {
      pauseDepth += 1;
      if (pauseDepth === 1) {
        halt();
      }
    },
    resume: () => {
      if (pauseDepth === 0) {
        return;
      }
      pauseDepth -= 1;
      if (pauseDepth === 0 && !disposed && !controller.signal.aborted) {
        start();
      }
    },
    dispose: () => {
      disposed = true;
      halt();
    },
  };
}

/**
 * Assigns every deal to the first target (in configuration order) that listed it.
 * @param results listing results, in configuration order
 */
export function assignOwnership(
  targets: ReadonlyArray<Target>,
  results: ReadonlyArray<ApiResult<DealListing>>,
): TargetFetch[] {
  const claimed = new Set<number>();
  const fetches: TargetFetch[] = [];

  targets.forEach((target, index) => {
    const targetKey = buildTargetKey(target);
    const result = results[index];
    if (!result) {
      fetches.push({ ok: false, target, targetKey, failure: createUnexpectedFailure('no listing result') });
      return;
    }
    if (!result.ok) {
      fetches.push({ ok: false, target, targetKey, failure: result.failure });
      return;
    }

    const owned: Deal[] = [];
    const listedIds = new Set<number>();
    for (const deal of result.value.deals) {
      listedIds.add(deal.id);
      if (claimed.has(deal.id)) {
        continue;
      }
      claimed.add(deal.id);
      owned.push(deal);
    }
    fetches.push({ ok: true, target, targetKey, owned, listedIds, failedBots: result.value.failedBots });
  });

  return fetches;
}
