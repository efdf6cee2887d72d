/**
 * Deal identifier as issued by the platform.
 */
export type DealId = number;

/**
 * Kind of a monitored target.
 * `account` expands to every bot of the account, `bot` to the bot's active deals, `deal` pins one deal.
 */
export type TargetKind = 'account' | 'bot' | 'deal';

/**
 * An account, bot or deal selected for monitoring.
 * Data source: configuration; immutable for a run.
 */
export type Target = {
  readonly kind: TargetKind;
  readonly id: number;
};

/**
 * Normalized deal status.
 * - active: open and eligible for adjustment
 * - closing: transitional platform state (panic sell, stop loss pending ...); never touched
 * - completed / cancelled: closed
 */
export type DealStatus = 'active' | 'closing' | 'completed' | 'cancelled';

/**
 * Read-mostly copy of a remote deal.
 * Data source: client parsers normalize the platform payload into this shape;
 * `currentStopLoss` is on the PnL axis (negative = loss, positive = locked-in profit).
 */
export type Deal = {
  readonly id: DealId;
  readonly botId: number | null;
  readonly accountId: number | null;
  readonly botName: string | null;
  readonly pair: string | null;
  readonly status: DealStatus;
  readonly rawStatus: string;
  readonly pnlPercent: number;
  readonly currentStopLoss: number | null;
  readonly trailingStopEnabled: boolean;
};

/**
 * Threshold policy: once PnL reaches `minPnlPercent`, move the stop loss to `newStopLossPercent`.
 */
export type Rule = {
  readonly minPnlPercent: number;
  readonly newStopLossPercent: number;
};

/**
 * Local record of a deal.
 * `stopLoss` and `lastActionAt` change only after a confirmed update; the observation fields
 * change every cycle.
 */
export type Snapshot = {
  readonly dealId: DealId;
  readonly targetKey: string;
  readonly pnlPercent: number;
  readonly stopLoss: number | null;
  readonly lastActionAt: number | null;
  readonly lastObservedAt: number;
};

/**
 * Reason attached to a skip decision or result.
 */
export type SkipReason =
  | 'inactive'
  | 'trailing stop enabled'
  | 'below threshold'
  | 'already applied'
  | 'not found';

/**
 * Evaluator output.
 */
export type Decision =
  | { readonly kind: 'apply'; readonly stopLossPercent: number; readonly rule: Rule }
  | { readonly kind: 'skip'; readonly reason: SkipReason };
