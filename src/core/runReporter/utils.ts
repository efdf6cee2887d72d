import type { ActionResult, ApiFailure, Deal, DealId } from '../../types/index.js';
import { formatNumber } from '../../utils/helpers/index.js';

/**
 * One-line description of a failure.
 */
export function describeFailure(failure: ApiFailure): string {
  switch (failure.kind) {
    case 'rateLimited':
      return failure.retryAfterMs === null
        ? 'rate limited'
        : `rate limited (retry after ${failure.retryAfterMs}ms)`;
    case 'unauthorized':
    case 'forbidden':
    case 'notFound':
      return `${failure.kind}: ${failure.message}`;
    case 'transient':
      return `transient: ${failure.cause}`;
    case 'invalidResponse':
      return `invalid response: ${failure.cause}`;
  }
}

/**
 * Deal label for messages, e.g. `deal 42 (USDT_BTC, Main bot)`.
 */
export function formatDealLabel(dealId: DealId, deal?: Deal): string {
  const details = [deal?.pair, deal?.botName].filter((item): item is string => typeof item === 'string');
  return details.length === 0 ? `deal ${dealId}` : `deal ${dealId} (${details.join(', ')})`;
}

/**
 * Human-readable detail of a result.
 */
export function describeResult(label: string, result: ActionResult): string {
  switch (result.kind) {
    case 'applied':
      return `${label}: stop loss moved to ${formatNumber(result.stopLossPercent)}%`;
    case 'skipped':
      return `${label}: skipped, ${result.reason}`;
    case 'failed':
      return `${label}: update failed, ${describeFailure(result.failure)}`;
  }
}
