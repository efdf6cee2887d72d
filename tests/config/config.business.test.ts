/**
 * Run configuration business tests
 *
 * - defaults and parsing of every setting group
 * - all problems reported in one pass through ConfigValidationError
 */
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { createBotNannyConfig, createLoggingConfig } from '../../src/config/config.index.js';
import { isConfigValidationError } from '../../src/config/config.validator.js';
import type { ConfigValidationError } from '../../src/config/types.js';
import { getBooleanConfig, getStringConfig, parseIdListConfig, parseRulesConfig } from '../../src/config/utils.js';
import { createRecordingLogger, type RecordingLogger } from '../helpers/testDoubles.js';

function createBaseEnv(overrides: Readonly<Record<string, string>> = {}): NodeJS.ProcessEnv {
  return {
    THREE_COMMAS_API_KEY: 'test-key',
    THREE_COMMAS_API_SECRET: 'test-secret',
    THREE_COMMAS_BOT_IDS: '10',
    ...overrides,
  };
}

function captureConfigError(env: NodeJS.ProcessEnv, logger: RecordingLogger = createRecordingLogger()): ConfigValidationError {
  try {
    createBotNannyConfig({ env, logger });
  } catch (err) {
    if (isConfigValidationError(err)) {
      return err;
    }
    throw err;
  }
  assert.fail('expected a ConfigValidationError');
}

describe('createBotNannyConfig', () => {
  it('applies defaults when only credentials and a target are set', () => {
    const config = createBotNannyConfig({ env: createBaseEnv(), logger: createRecordingLogger() });

    assert.deepEqual(config.monitor, {
      targets: [{ kind: 'bot', id: 10 }],
      rules: [{ minPnlPercent: 4, newStopLossPercent: 1 }],
      intervalMs: 600_000,
      targetTimeoutMs: 120_000,
      escalateAfterCycles: 3,
      pnlPrecision: 2,
    });
    assert.deepEqual(config.threeCommas, {
      apiKey: 'test-key',
      apiSecret: 'test-secret',
      baseUrl: 'https://api.3commas.io',
      timeoutMs: 10_000,
      minIntervalMs: 1000,
      maxCallsPerWindow: 60,
      rateWindowMs: 60_000,
      retry: { maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 30_000, maxRetryAfterMs: 120_000 },
    });
    assert.equal(config.telegram, null);
    assert.deepEqual(config.logging, { logDir: 'logs', debug: false });
  });

  it('reads targets in account, bot, deal order and drops duplicate ids', () => {
    const config = createBotNannyConfig({
      env: createBaseEnv({
        THREE_COMMAS_DEAL_IDS: '7',
        THREE_COMMAS_BOT_IDS: '10, 11,10',
        THREE_COMMAS_ACCOUNT_IDS: '5',
      }),
      logger: createRecordingLogger(),
    });

    assert.deepEqual(config.monitor.targets, [
      { kind: 'account', id: 5 },
      { kind: 'bot', id: 10 },
      { kind: 'bot', id: 11 },
      { kind: 'deal', id: 7 },
    ]);
  });

  it('uses STOP_LOSS_RULES sorted by threshold instead of the single rule', () => {
    const config = createBotNannyConfig({
      env: createBaseEnv({ STOP_LOSS_RULES: '8:3, 4:1', TARGET_PNL_PERCENT: '2' }),
      logger: createRecordingLogger(),
    });

    assert.deepEqual(config.monitor.rules, [
      { minPnlPercent: 4, newStopLossPercent: 1 },
      { minPnlPercent: 8, newStopLossPercent: 3 },
    ]);
  });

  it('converts the interval to milliseconds and strips the base URL trailing slash', () => {
    const config = createBotNannyConfig({
      env: createBaseEnv({
        INTERVAL_SECONDS: '30',
        THREE_COMMAS_BASE_URL: 'https://api.example.test/',
        PNL_PRECISION: '4',
      }),
      logger: createRecordingLogger(),
    });

    assert.equal(config.monitor.intervalMs, 30_000);
    assert.equal(config.monitor.pnlPrecision, 4);
    assert.equal(config.threeCommas.baseUrl, 'https://api.example.test');
  });

  it('enables Telegram only when both token and chat are set', () => {
    const config = createBotNannyConfig({
      env: createBaseEnv({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '-100' }),
      logger: createRecordingLogger(),
    });
    assert.deepEqual(config.telegram, { botToken: 'test-token', chatId: '-100' });

    const err = captureConfigError(createBaseEnv({ TELEGRAM_BOT_TOKEN: 'test-token' }));
    assert.deepEqual(err.missingFields, ['TELEGRAM_CHAT_ID']);
  });

  it('reports every problem at once and lists the missing fields', () => {
    const logger = createRecordingLogger();
    const err = captureConfigError({ THREE_COMMAS_API_SECRET: 'test-secret' }, logger);

    assert.equal(err.message, 'Configuration validation failed: 2 problem(s)');
    assert.deepEqual(err.missingFields, ['THREE_COMMAS_API_KEY', 'THREE_COMMAS_ACCOUNT_IDS']);
    const errors = logger.messages('error');
    assert.ok(errors.includes('1. THREE_COMMAS_API_KEY is not set'));
    assert.ok(
      errors.includes(
        '2. No target configured: set THREE_COMMAS_ACCOUNT_IDS, THREE_COMMAS_BOT_IDS or THREE_COMMAS_DEAL_IDS',
      ),
    );
  });

  it('treats the placeholder credential as unset', () => {
    const err = captureConfigError(createBaseEnv({ THREE_COMMAS_API_KEY: 'your_three_commas_api_key_here' }));
    assert.deepEqual(err.missingFields, ['THREE_COMMAS_API_KEY']);
  });

  it('rejects a stop loss that is not below its threshold', () => {
    const logger = createRecordingLogger();
    captureConfigError(createBaseEnv({ TARGET_PNL_PERCENT: '1', ADJUSTED_SL_PERCENT: '2' }), logger);

    assert.ok(
      logger.messages('error').includes('1. TARGET_PNL_PERCENT/ADJUSTED_SL_PERCENT: stop loss 2 must be below its threshold 1'),
    );
  });

  it('rejects unparsable and duplicate rule entries', () => {
    const logger = createRecordingLogger();
    const err = captureConfigError(createBaseEnv({ STOP_LOSS_RULES: '4:1,bad,4:2' }), logger);

    assert.equal(err.message, 'Configuration validation failed: 2 problem(s)');
    const errors = logger.messages('error');
    assert.ok(errors.includes('1. STOP_LOSS_RULES holds invalid entries (expected min:sl): bad'));
    assert.ok(errors.includes('2. STOP_LOSS_RULES: threshold 4 appears more than once'));
  });

  it('rejects out-of-range numbers and inconsistent retry delays', () => {
    const logger = createRecordingLogger();
    captureConfigError(
      createBaseEnv({
        INTERVAL_SECONDS: 'abc',
        ESCALATE_AFTER_CYCLES: '1.5',
        API_BASE_DELAY_MS: '5000',
        API_MAX_DELAY_MS: '1000',
        THREE_COMMAS_BASE_URL: 'ftp://api.example.test',
        THREE_COMMAS_BOT_IDS: '10,x',
      }),
      logger,
    );

    assert.deepEqual(logger.messages('error').filter((msg) => /^\d+\. /.test(msg)), [
      '1. THREE_COMMAS_BASE_URL must be an http(s) origin, got "ftp://api.example.test"',
      '2. THREE_COMMAS_BOT_IDS holds invalid ids: x',
      '3. INTERVAL_SECONDS must be a number between 1 and 86400',
      '4. ESCALATE_AFTER_CYCLES must be an integer between 1 and 1000',
      '5. API_BASE_DELAY_MS (5000) must not exceed API_MAX_DELAY_MS (1000)',
    ]);
  });
});

describe('createLoggingConfig', () => {
  it('prefers the command line directory over LOG_DIR', () => {
    const env = { LOG_DIR: '/var/log/botnanny', DEBUG: 'true' };
    assert.deepEqual(createLoggingConfig({ env }), { logDir: '/var/log/botnanny', debug: true });
    assert.deepEqual(createLoggingConfig({ env, logDirOverride: './tmp-logs' }), { logDir: './tmp-logs', debug: true });
  });
});

describe('config parsers', () => {
  it('parses id lists and collects invalid tokens', () => {
    assert.deepEqual(parseIdListConfig({ IDS: '12, x, 0, 12,,34' }, 'IDS'), { ids: [12, 34], invalid: ['x', '0'] });
    assert.deepEqual(parseIdListConfig({}, 'IDS'), { ids: [], invalid: [] });
  });

  it('returns null for an unset rule list', () => {
    assert.equal(parseRulesConfig({}, 'STOP_LOSS_RULES'), null);
    assert.deepEqual(parseRulesConfig({ STOP_LOSS_RULES: '4:1, 8 : 3, 2:' }, 'STOP_LOSS_RULES'), {
      rules: [
        { minPnlPercent: 4, newStopLossPercent: 1 },
        { minPnlPercent: 8, newStopLossPercent: 3 },
      ],
      invalid: ['2:'],
    });
  });

  it('reads strings and booleans', () => {
    assert.equal(getStringConfig({ KEY: '  value ' }, 'KEY'), 'value');
    assert.equal(getStringConfig({ KEY: '   ' }, 'KEY'), null);
    assert.equal(getBooleanConfig({ FLAG: 'TRUE' }, 'FLAG'), true);
    assert.equal(getBooleanConfig({ FLAG: 'yes' }, 'FLAG', false), false);
  });
});
