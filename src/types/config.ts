import type { Rule, Target } from './deal.js';

/**
 * Retry policy shared by every remote call.
 * Data source: API_* environment variables.
 */
export type RetryPolicy = {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly maxRetryAfterMs: number;
};

/**
 * 3Commas connection settings.
 */
export type ThreeCommasConfig = {
  readonly apiKey: string;
  readonly apiSecret: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly minIntervalMs: number;
  readonly maxCallsPerWindow: number;
  readonly rateWindowMs: number;
  readonly retry: RetryPolicy;
};

/**
 * Telegram notifier settings; both values are required to enable it.
 */
export type TelegramConfig = {
  readonly botToken: string;
  readonly chatId: string;
};

/**
 * Monitoring loop settings.
 */
export type MonitorConfig = {
  readonly targets: ReadonlyArray<Target>;
  readonly rules: ReadonlyArray<Rule>;
  readonly intervalMs: number;
  readonly targetTimeoutMs: number;
  readonly escalateAfterCycles: number;
  readonly pnlPrecision: number;
};

/**
 * Logging settings.
 */
export type LoggingConfig = {
  readonly logDir: string;
  readonly debug: boolean;
};

/**
 * Whole run configuration, loaded once at startup.
 */
export type BotNannyConfig = {
  readonly threeCommas: ThreeCommasConfig;
  readonly telegram: TelegramConfig | null;
  readonly monitor: MonitorConfig;
  readonly logging: LoggingConfig;
};
