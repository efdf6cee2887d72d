export type {
  Decision,
  Deal,
  DealId,
  DealStatus,
  Rule,
  SkipReason,
  Snapshot,
  Target,
  TargetKind,
} from './deal.js';
export type {
  Account,
  Ack,
  ApiFailure,
  ApiFailureKind,
  ApiResult,
  Bot,
  BotListingFailure,
  DealListing,
  ListingBudget,
  TradingPlatformClient,
} from './api.js';
export type {
  BotNannyConfig,
  LoggingConfig,
  MonitorConfig,
  RetryPolicy,
  TelegramConfig,
  ThreeCommasConfig,
} from './config.js';
export type { ActionResult, CycleSummary } from './results.js';
