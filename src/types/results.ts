import type { ApiFailure } from './api.js';
import type { SkipReason } from './deal.js';

/**
 * Outcome of evaluating and applying one deal in one cycle.
 */
export type ActionResult =
  | { readonly kind: 'applied'; readonly stopLossPercent: number }
  | { readonly kind: 'skipped'; readonly reason: SkipReason }
  | { readonly kind: 'failed'; readonly failure: ApiFailure };

/**
 * Totals of one monitoring cycle.
 */
export type CycleSummary = {
  readonly cycle: number;
  readonly startedAt: number;
  readonly durationMs: number;
  readonly dealsProcessed: number;
  readonly applied: number;
  readonly skipped: number;
  readonly failed: number;
  readonly failedTargets: ReadonlyArray<string>;
};
