/**
 * Global constants
 *
 * Groups every constant used across the project:
 * - application: name and version shown in the banner
 * - time: millisecond conversions
 * - 3Commas: API origin, path prefix, page sizes
 * - API: retry, timeout and request spacing defaults
 * - monitor: polling and escalation defaults
 * - logging: level numbers and stream drain timeouts
 * - deals: platform status classification
 */

/** Application identity */
export const APP = {
  NAME: 'BotNanny',
  VERSION: '1.0.0',
} as const;

/** Time constants */
export const TIME = {
  MILLISECONDS_PER_SECOND: 1000,
  MILLISECONDS_PER_MINUTE: 60_000,
} as const;

/** 3Commas public API */
export const THREE_COMMAS = {
  /** Default API origin */
  BASE_URL: 'https://api.3commas.io',
  /** Path prefix shared by every endpoint; part of the signed payload */
  API_PREFIX: '/public/api/ver1',
  /** Page size used when listing bots */
  BOTS_BATCH_SIZE: 100,
  /** Page size used when listing deals */
  DEALS_BATCH_SIZE: 1000,
  /** Stop loss type sent with every update */
  STOP_LOSS_TYPE: 'stop_loss',
} as const;

/** Telegram Bot API origin */
export const TELEGRAM_API_URL = 'https://api.telegram.org';

/** API call defaults */
export const API = {
  /** Per-request timeout (ms) */
  DEFAULT_TIMEOUT_MS: 10_000,
  /** Upper bound on attempts for one logical call (first try included) */
  DEFAULT_MAX_ATTEMPTS: 3,
  /** First backoff delay (ms); doubles on every attempt */
  DEFAULT_BASE_DELAY_MS: 500,
  /** Backoff ceiling (ms) */
  DEFAULT_MAX_DELAY_MS: 30_000,
  /** Ceiling applied to a platform-specified Retry-After (ms) */
  DEFAULT_MAX_RETRY_AFTER_MS: 120_000,
  /** Minimum spacing between two API calls (ms) */
  DEFAULT_MIN_INTERVAL_MS: 1000,
  /** Calls allowed per rate window */
  DEFAULT_MAX_CALLS_PER_WINDOW: 60,
  /** Rate window length (ms) */
  DEFAULT_RATE_WINDOW_MS: 60_000,
  /** Safety margin added when waiting for the rate window to slide (ms) */
  RATE_LIMIT_BUFFER_MS: 100,
} as const;

/** Monitoring loop defaults */
export const MONITOR = {
  DEFAULT_INTERVAL_SECONDS: 600,
  DEFAULT_TARGET_TIMEOUT_MS: 120_000,
  DEFAULT_ESCALATE_AFTER_CYCLES: 3,
  DEFAULT_PNL_PRECISION: 2,
  DEFAULT_TARGET_PNL_PERCENT: 4.0,
  DEFAULT_ADJUSTED_SL_PERCENT: 1.0,
} as const;

/** pino level numbers */
export const LOG_LEVELS = {
  DEBUG: 20,
  INFO: 30,
  WARN: 40,
  ERROR: 50,
} as const;

/** Logging stream settings */
export const LOGGING = {
  /** File stream drain timeout (ms) */
  DRAIN_TIMEOUT_MS: 5000,
  /** Console stream drain timeout (ms) */
  CONSOLE_DRAIN_TIMEOUT_MS: 3000,
  /** Default log directory, relative to the working directory */
  DEFAULT_LOG_DIR: 'logs',
} as const;

/** Platform statuses of a deal that is already closed */
export const COMPLETED_DEAL_STATUSES: ReadonlySet<string> = new Set([
  'completed',
  'panic_sold',
  'stop_loss_finished',
  'switched',
  'switched_take_profit',
  'liquidated',
  'settled',
]);

/** Platform statuses of a deal that was abandoned */
export const CANCELLED_DEAL_STATUSES: ReadonlySet<string> = new Set([
  'cancelled',
  'failed',
]);

/** Platform statuses of a deal in the middle of closing; never touched */
export const CLOSING_DEAL_STATUSES: ReadonlySet<string> = new Set([
  'panic_sell_pending',
  'panic_sell_order_placed',
  'cancel_pending',
  'stop_loss_pending',
  'stop_loss_order_placed',
  'bought_safety_pending',
  'bought_take_profit_pending',
]);
