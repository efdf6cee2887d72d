#!/usr/bin/env node
/**
 * BotNanny - entry point
 *
 * Watches open 3Commas deals and tightens their stop loss once PnL crosses a configured threshold.
 *
 * Flow:
 * 1. command line and dotenv file
 * 2. logger, then the validated configuration
 * 3. client, notifier, snapshot store, reporter and monitoring loop
 * 4. exit handlers and startup checks
 * 5. the loop (or a single cycle with --once), then cleanup
 *
 * Exit codes: 0 after a clean shutdown; 1 on configuration failure, rejected credentials at first
 * contact or an uncaught exception.
 */
import dotenv from 'dotenv';
import { parseArgs } from 'node:util';
import { createBotNannyConfig, createLoggingConfig } from './config/config.index.js';
import { isConfigValidationError } from './config/config.validator.js';
import { APP } from './constants/index.js';
import { createRunReporter } from './core/runReporter/index.js';
import { createSnapshotStore } from './core/snapshotStore/index.js';
import { createMonitorLoop } from './main/monitorLoop/index.js';
import { runStartup } from './main/startup/index.js';
import { createCleanup } from './services/cleanup/index.js';
import { createTelegramNotifier } from './services/telegramNotifier/index.js';
import { createThreeCommasClient } from './services/threeCommasClient/index.js';
import type { BotNannyConfig } from './types/index.js';
import { formatError } from './utils/error/index.js';
import { createLogger } from './utils/logger/index.js';

const USAGE = 'Usage: botnanny [--config <file>] [--log-dir <dir>] [--once] [--version]';

/**
 * Runs the program and returns the exit code.
 */
async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', default: '.env' },
      'log-dir': { type: 'string' },
      once: { type: 'boolean', default: false },
      version: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });

  if (values.version) {
    process.stdout.write(`${APP.NAME} ${APP.VERSION}\n`);
    return 0;
  }
  if (values.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const configPath = values.config ?? '.env';
  const loaded = dotenv.config({ path: configPath });
  const env = process.env;

  const logger = createLogger(createLoggingConfig({ env, logDirOverride: values['log-dir'] ?? null }));
  if (loaded.error) {
    logger.warn(`[Config] ${configPath} not loaded, using the process environment only: ${formatError(loaded.error)}`);
  }

  let config: BotNannyConfig;
  try {
    config = createBotNannyConfig({ env, logger, logDirOverride: values['log-dir'] ?? null });
  } catch (err) {
    if (isConfigValidationError(err)) {
      logger.error('Startup failed: configuration is invalid');
    } else {
      logger.error(`Startup failed while reading the configuration: ${formatError(err)}`);
    }
    logger.closeSync();
    return 1;
  }

  const nowMs = Date.now;
  const client = createThreeCommasClient({ config: config.threeCommas, logger });
  const notifier = createTelegramNotifier({ config: config.telegram, timeoutMs: config.threeCommas.timeoutMs });
  const store = createSnapshotStore({ nowMs });
  const reporter = createRunReporter({ logger, notifier, nowMs });
  const loop = createMonitorLoop({ client, store, reporter, logger, config: config.monitor, nowMs });

  const cleanup = createCleanup({
    logger,
    requestStop: () => loop.stop(),
    flush: () => reporter.flush(),
  });
  cleanup.registerExitHandlers();

  const startup = await runStartup({ client, notifier, logger, config, version: APP.VERSION });
  if (!startup.ok) {
    logger.error('Startup failed: check THREE_COMMAS_API_KEY and THREE_COMMAS_API_SECRET');
    await cleanup.execute();
    return 1;
  }

  if (values.once) {
    await loop.runCycle();
  } else {
    await loop.run();
  }

  await cleanup.execute();
  return 0;
}

try {
  process.exitCode = await main();
} catch (err: unknown) {
  process.stderr.write(`BotNanny exited abnormally: ${formatError(err)}\n`);
  process.exit(1);
}
