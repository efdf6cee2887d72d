/**
 * Startup business tests
 */
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { runStartup } from '../../../src/main/startup/index.js';
import { createBotNannyConfig } from '../../../mock/factories/configFactory.js';
import { createFakeTradingPlatform } from '../../../mock/threeCommas/fakePlatform.js';
import { createRecordingLogger, createRecordingNotifier } from '../../helpers/testDoubles.js';

describe('startup', () => {
  it('logs the banner, the visible accounts and the configuration, then notifies', async () => {
    const client = createFakeTradingPlatform();
    client.setAccounts([{ id: 7, name: 'Main' }]);
    const logger = createRecordingLogger();
    const notifier = createRecordingNotifier();

    const result = await runStartup({ client, notifier, logger, config: createBotNannyConfig(), version: '1.0.0' });

    assert.deepEqual(result, { ok: true, accounts: [{ id: 7, name: 'Main' }] });
    assert.deepEqual(logger.messages('info').slice(3), [
      '[Startup] visible accounts: Main (7)',
      '[Config] Targets: bot:10',
      '[Config] Rules: PnL >= 4.00% -> SL 1.00%',
      '[Config] Interval: 600s, target timeout 120000ms',
      '[Config] API: https://api.example.test, timeout 10000ms, 3 attempt(s)',
      '[Config] Telegram: disabled',
    ]);
    assert.equal(logger.messages('info')[0], 'BotNanny 1.0.0');
    assert.equal(
      logger.records.some((record) => record.msg.includes('test-secret')),
      false,
    );
    assert.deepEqual(notifier.sent, ['BotNanny 1.0.0 started']);
  });

  it('stops on rejected credentials', async () => {
    const client = createFakeTradingPlatform();
    client.setFailureRule('listAccounts', { failure: { kind: 'unauthorized', message: 'HTTP 401' } });
    const logger = createRecordingLogger();
    const notifier = createRecordingNotifier();

    const result = await runStartup({ client, notifier, logger, config: createBotNannyConfig(), version: '1.0.0' });

    assert.deepEqual(result, { ok: false, fatal: { kind: 'unauthorized', message: 'HTTP 401' } });
    assert.deepEqual(logger.messages('error'), ['[Startup] 3Commas rejected the credentials: unauthorized: HTTP 401']);
    assert.deepEqual(notifier.sent, []);
  });

  it('starts anyway when first contact fails for another reason', async () => {
    const client = createFakeTradingPlatform();
    client.setFailureRule('listAccounts', { failure: { kind: 'transient', cause: 'HTTP 502', retryable: true } });
    const logger = createRecordingLogger();

    const result = await runStartup({
      client,
      notifier: createRecordingNotifier(),
      logger,
      config: createBotNannyConfig(),
      version: '1.0.0',
    });

    assert.deepEqual(result, { ok: true, accounts: [] });
    assert.deepEqual(logger.messages('warn'), ['[Startup] could not list accounts, starting anyway: transient: HTTP 502']);
  });

  it('does not fail when the startup notification fails', async () => {
    const client = createFakeTradingPlatform();
    const logger = createRecordingLogger();

    const result = await runStartup({
      client,
      notifier: createRecordingNotifier({ fail: true }),
      logger,
      config: createBotNannyConfig(),
      version: '1.0.0',
    });

    assert.equal(result.ok, true);
    assert.deepEqual(logger.messages('warn'), ['[Startup] startup notification failed: telegram unreachable']);
  });
});
