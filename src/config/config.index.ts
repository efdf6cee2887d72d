/**
 * Run configuration
 *
 * Reads every setting from the environment (dotenv has already loaded the file named by --config),
 * collects every problem in one pass and throws a ConfigValidationError before anything starts.
 *
 * Environment variables:
 * - THREE_COMMAS_API_KEY / THREE_COMMAS_API_SECRET: credentials (required)
 * - THREE_COMMAS_BASE_URL: API origin
 * - THREE_COMMAS_ACCOUNT_IDS / THREE_COMMAS_BOT_IDS / THREE_COMMAS_DEAL_IDS: targets, at least one
 * - INTERVAL_SECONDS, TARGET_TIMEOUT_MS, ESCALATE_AFTER_CYCLES: monitoring loop
 * - TARGET_PNL_PERCENT / ADJUSTED_SL_PERCENT or STOP_LOSS_RULES: rule set
 * - PNL_PRECISION: decimal places used for comparisons
 * - API_*: timeouts, retries and request spacing
 * - TELEGRAM_BOT_TOKEN / TELEGRAM_CHAT_ID: optional notifier
 * - LOG_DIR / DEBUG: logging
 */
import { API, LOGGING, MONITOR, THREE_COMMAS, TIME } from '../constants/index.js';
import type {
  BotNannyConfig,
  LoggingConfig,
  Rule,
  Target,
  TargetKind,
  TelegramConfig,
} from '../types/index.js';
import type { Logger } from '../utils/logger/index.js';
import { assertNoConfigIssues, validateRules } from './config.validator.js';
import type { BoundedNumberConfig, ConfigIssues } from './types.js';
import {
  getBooleanConfig,
  getStringConfig,
  parseBoundedNumberConfig,
  parseIdListConfig,
  parseRulesConfig,
} from './utils.js';

const TARGET_ENV_KEYS: ReadonlyArray<{ readonly kind: TargetKind; readonly envKey: string }> = [
  { kind: 'account', envKey: 'THREE_COMMAS_ACCOUNT_IDS' },
  { kind: 'bot', envKey: 'THREE_COMMAS_BOT_IDS' },
  { kind: 'deal', envKey: 'THREE_COMMAS_DEAL_IDS' },
];

function readNumber(env: NodeJS.ProcessEnv, setting: BoundedNumberConfig, issues: ConfigIssues): number {
  const value = parseBoundedNumberConfig(env, setting);
  if (value === null) {
    const kind = setting.integer ? 'an integer' : 'a number';
    issues.errors.push(`${setting.envKey} must be ${kind} between ${setting.min} and ${setting.max}`);
    return setting.defaultValue;
  }
  return value;
}

function readRequiredString(env: NodeJS.ProcessEnv, envKey: string, issues: ConfigIssues): string {
  const value = getStringConfig(env, envKey);
  if (value === null) {
    issues.errors.push(`${envKey} is not set`);
    issues.missingFields.push(envKey);
    return '';
  }
  return value;
}

function readBaseUrl(env: NodeJS.ProcessEnv, issues: ConfigIssues): string {
  const value = getStringConfig(env, 'THREE_COMMAS_BASE_URL') ?? THREE_COMMAS.BASE_URL;
  if (!/^https?:\/\/[^/\s]+/.test(value)) {
    issues.errors.push(`THREE_COMMAS_BASE_URL must be an http(s) origin, got "${value}"`);
    return THREE_COMMAS.BASE_URL;
  }
  return value.replace(/\/+$/, '');
}

function readTargets(env: NodeJS.ProcessEnv, issues: ConfigIssues): Target[] {
  const targets: Target[] = [];
  for (const { kind, envKey } of TARGET_ENV_KEYS) {
    const { ids, invalid } = parseIdListConfig(env, envKey);
    if (invalid.length > 0) {
      issues.errors.push(`${envKey} holds invalid ids: ${invalid.join(', ')}`);
    }
    for (const id of ids) {
      targets.push({ kind, id });
    }
  }
  if (targets.length === 0) {
    issues.errors.push('No target configured: set THREE_COMMAS_ACCOUNT_IDS, THREE_COMMAS_BOT_IDS or THREE_COMMAS_DEAL_IDS');
    issues.missingFields.push('THREE_COMMAS_ACCOUNT_IDS');
  }
  return targets;
}

function readRules(env: NodeJS.ProcessEnv, issues: ConfigIssues): Rule[] {
  const parsed = parseRulesConfig(env, 'STOP_LOSS_RULES');
  if (parsed !== null) {
    if (parsed.invalid.length > 0) {
      issues.errors.push(`STOP_LOSS_RULES holds invalid entries (expected min:sl): ${parsed.invalid.join(', ')}`);
    }
    const result = validateRules(parsed.rules, 'STOP_LOSS_RULES');
    issues.errors.push(...result.errors);
    return [...parsed.rules].sort((a, b) => a.minPnlPercent - b.minPnlPercent);
  }

  const rule: Rule = {
    minPnlPercent: readNumber(
      env,
      { envKey: 'TARGET_PNL_PERCENT', defaultValue: MONITOR.DEFAULT_TARGET_PNL_PERCENT, min: -1000, max: 1000 },
      issues,
    ),
    newStopLossPercent: readNumber(
      env,
      { envKey: 'ADJUSTED_SL_PERCENT', defaultValue: MONITOR.DEFAULT_ADJUSTED_SL_PERCENT, min: -1000, max: 1000 },
      issues,
    ),
  };
  const result = validateRules([rule], 'TARGET_PNL_PERCENT/ADJUSTED_SL_PERCENT');
  issues.errors.push(...result.errors);
  return [rule];
}

function readTelegram(env: NodeJS.ProcessEnv, issues: ConfigIssues): TelegramConfig | null {
  const botToken = getStringConfig(env, 'TELEGRAM_BOT_TOKEN');
  const chatId = getStringConfig(env, 'TELEGRAM_CHAT_ID');
  if (botToken === null && chatId === null) {
    return null;
  }
  if (botToken === null || chatId === null) {
    const missing = botToken === null ? 'TELEGRAM_BOT_TOKEN' : 'TELEGRAM_CHAT_ID';
    issues.errors.push(`${missing} is required when Telegram notifications are enabled`);
    issues.missingFields.push(missing);
    return null;
  }
  return { botToken, chatId };
}

/**
 * Reads the logging settings only. Used by the entry point before the full configuration, so that
 * configuration errors can already be logged.
 */
export function createLoggingConfig({
  env,
  logDirOverride = null,
}: {
  env: NodeJS.ProcessEnv;
  logDirOverride?: string | null;
}): LoggingConfig {
  return {
    logDir: logDirOverride ?? getStringConfig(env, 'LOG_DIR') ?? LOGGING.DEFAULT_LOG_DIR,
    debug: getBooleanConfig(env, 'DEBUG', false),
  };
}

/**
 * Builds the run configuration.
 * @throws {ConfigValidationError} when at least one setting is missing or invalid
 */
export function createBotNannyConfig({
  env,
  logger,
  logDirOverride = null,
}: {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  logDirOverride?: string | null;
}): BotNannyConfig {
  const issues: ConfigIssues = { errors: [], missingFields: [] };

  const apiKey = readRequiredString(env, 'THREE_COMMAS_API_KEY', issues);
  const apiSecret = readRequiredString(env, 'THREE_COMMAS_API_SECRET', issues);
  const baseUrl = readBaseUrl(env, issues);

  const targets = readTargets(env, issues);
  const rules = readRules(env, issues);

  const intervalSeconds = readNumber(
    env,
    { envKey: 'INTERVAL_SECONDS', defaultValue: MONITOR.DEFAULT_INTERVAL_SECONDS, min: 1, max: 86_400 },
    issues,
  );
  const targetTimeoutMs = readNumber(
    env,
    { envKey: 'TARGET_TIMEOUT_MS', defaultValue: MONITOR.DEFAULT_TARGET_TIMEOUT_MS, min: 1000, max: 3_600_000, integer: true },
    issues,
  );
  const escalateAfterCycles = readNumber(
    env,
    { envKey: 'ESCALATE_AFTER_CYCLES', defaultValue: MONITOR.DEFAULT_ESCALATE_AFTER_CYCLES, min: 1, max: 1000, integer: true },
    issues,
  );
  const pnlPrecision = readNumber(
    env,
    { envKey: 'PNL_PRECISION', defaultValue: MONITOR.DEFAULT_PNL_PRECISION, min: 0, max: 8, integer: true },
    issues,
  );

  const timeoutMs = readNumber(
    env,
    { envKey: 'API_TIMEOUT_MS', defaultValue: API.DEFAULT_TIMEOUT_MS, min: 100, max: 300_000, integer: true },
    issues,
  );
  const maxAttempts = readNumber(
    env,
    { envKey: 'API_MAX_ATTEMPTS', defaultValue: API.DEFAULT_MAX_ATTEMPTS, min: 1, max: 10, integer: true },
    issues,
  );
  const baseDelayMs = readNumber(
    env,
    { envKey: 'API_BASE_DELAY_MS', defaultValue: API.DEFAULT_BASE_DELAY_MS, min: 0, max: 60_000, integer: true },
    issues,
  );
  const maxDelayMs = readNumber(
    env,
    { envKey: 'API_MAX_DELAY_MS', defaultValue: API.DEFAULT_MAX_DELAY_MS, min: 0, max: 600_000, integer: true },
    issues,
  );
  const maxRetryAfterMs = readNumber(
    env,
    { envKey: 'API_MAX_RETRY_AFTER_MS', defaultValue: API.DEFAULT_MAX_RETRY_AFTER_MS, min: 0, max: 3_600_000, integer: true },
    issues,
  );
  const minIntervalMs = readNumber(
    env,
    { envKey: 'API_MIN_INTERVAL_MS', defaultValue: API.DEFAULT_MIN_INTERVAL_MS, min: 0, max: 60_000, integer: true },
    issues,
  );
  if (baseDelayMs > maxDelayMs) {
    issues.errors.push(`API_BASE_DELAY_MS (${baseDelayMs}) must not exceed API_MAX_DELAY_MS (${maxDelayMs})`);
  }

  const telegram = readTelegram(env, issues);

  assertNoConfigIssues(issues, logger);

  return {
    threeCommas: {
      apiKey,
      apiSecret,
      baseUrl,
      timeoutMs,
      minIntervalMs,
      maxCallsPerWindow: API.DEFAULT_MAX_CALLS_PER_WINDOW,
      rateWindowMs: API.DEFAULT_RATE_WINDOW_MS,
      retry: { maxAttempts, baseDelayMs, maxDelayMs, maxRetryAfterMs },
    },
    telegram,
    monitor: {
      targets,
      rules,
      intervalMs: intervalSeconds * TIME.MILLISECONDS_PER_SECOND,
      targetTimeoutMs,
      escalateAfterCycles,
      pnlPrecision,
    },
    logging: createLoggingConfig({ env, logDirOverride }),
  };
}
