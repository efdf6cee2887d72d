import type { Deal, DealId, Target } from './deal.js';

/**
 * Tagged failure of a remote call.
 * - rateLimited: platform asked to slow down; `retryAfterMs` is null when it gave no delay
 * - unauthorized / forbidden: credential problems, never retried
 * - notFound: the entity is gone (usually a closed deal)
 * - transient: network, timeout or 5xx; `retryable` is false for unexpected 4xx answers
 * - invalidResponse: payload that cannot be parsed, never retried
 */
export type ApiFailure =
  | { readonly kind: 'rateLimited'; readonly retryAfterMs: number | null }
  | { readonly kind: 'unauthorized'; readonly message: string }
  | { readonly kind: 'forbidden'; readonly message: string }
  | { readonly kind: 'notFound'; readonly message: string }
  | { readonly kind: 'transient'; readonly cause: string; readonly retryable: boolean }
  | { readonly kind: 'invalidResponse'; readonly cause: string };

export type ApiFailureKind = ApiFailure['kind'];

/**
 * Result of a remote call; failures travel as values.
 */
export type ApiResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly failure: ApiFailure };

/**
 * Confirmation of a stop loss update.
 */
export type Ack = {
  readonly dealId: DealId;
  readonly stopLossPercent: number;
};

/**
 * Exchange account connected to the platform.
 */
export type Account = {
  readonly id: number;
  readonly name: string;
};

/**
 * Trading bot.
 */
export type Bot = {
  readonly id: number;
  readonly accountId: number | null;
  readonly name: string;
  readonly isEnabled: boolean;
};

/**
 * A bot whose deals could not be listed while an account was expanded.
 */
export type BotListingFailure = {
  readonly botId: number;
  readonly failure: ApiFailure;
};

/**
 * Deals listed for one target.
 * `failedBots` names the bots of an account whose deals are missing from `deals` this time.
 */
export type DealListing = {
  readonly deals: ReadonlyArray<Deal>;
  readonly failedBots: ReadonlyArray<BotListingFailure>;
};

/**
 * Time budget of one listing.
 * The client pauses it while a call waits for the rate limiter and issues no further call
 * once `signal` is aborted.
 */
export interface ListingBudget {
  readonly signal: AbortSignal;
  readonly pause: () => void;
  readonly resume: () => void;
}

/**
 * Remote trading platform as seen by the monitoring loop.
 * Implementations own signing, spacing, timeouts and retries.
 */
export interface TradingPlatformClient {
  readonly listAccounts: () => Promise<ApiResult<ReadonlyArray<Account>>>;
  readonly listBots: (accountId: number) => Promise<ApiResult<ReadonlyArray<Bot>>>;
  readonly listDeals: (target: Target, budget?: ListingBudget) => Promise<ApiResult<DealListing>>;
  readonly showDeal: (dealId: DealId) => Promise<ApiResult<Deal>>;
  readonly updateDealStopLoss: (dealId: DealId, stopLossPercent: number) => Promise<ApiResult<Ack>>;
}
