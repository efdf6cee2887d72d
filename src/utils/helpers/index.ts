import type { InterruptibleDelay } from './types.js';

/**
 * Resolves after `ms` milliseconds. Negative or non-finite delays resolve on the next tick.
 */
export async function sleep(ms: number): Promise<void> {
  const delay = Number.isFinite(ms) && ms > 0 ? ms : 0;
  return new Promise((resolve) => setTimeout(resolve, delay));
}

/**
 * Formats a number with fixed digits; null/undefined give "-".
 *
 * @param num number to format
 * @param digits decimal places, default 2
 */
export function formatNumber(num: number | null | undefined, digits: number = 2): string {
  if (num === null || num === undefined) {
    return '-';
  }
  return Number.isFinite(num) ? num.toFixed(digits) : String(num);
}

/**
 * Creates a delay that can be cut short. Used for the idle phase so that a stop request does not
 * have to wait for the full polling interval.
 */
export function createInterruptibleDelay(): InterruptibleDelay {
  let pending: { readonly timeoutId: NodeJS.Timeout; readonly resolve: () => void } | null = null;

  function wait(ms: number): Promise<void> {
    interrupt();
    return new Promise<void>((resolve) => {
      const timeoutId = setTimeout(() => {
        pending = null;
        resolve();
      }, Math.max(0, ms));
      pending = { timeoutId, resolve };
    });
  }

  function interrupt(): void {
    if (!pending) {
      return;
    }
    const { timeoutId, resolve } = pending;
    pending = null;
    clearTimeout(timeoutId);
    resolve();
  }

  return {
    wait,
    interrupt,
  };
}
