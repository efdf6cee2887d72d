/**
 * Startup
 *
 * 1. banner and risk notice
 * 2. first contact: listAccounts; unauthorized or forbidden is fatal, anything else only warns
 * 3. active configuration, secrets left out
 * 4. "started" notification
 */
import { describeFailure } from '../../core/runReporter/utils.js';
import { formatError } from '../../utils/error/index.js';
import type { StartupDeps, StartupResult } from './types.js';
import { buildBannerLines, formatConfigSummary } from './utils.js';

export async function runStartup({ client, notifier, logger, config, version }: StartupDeps): Promise<StartupResult> {
  for (const line of buildBannerLines(version)) {
    logger.info(line);
  }

  const accounts = await client.listAccounts();
  if (!accounts.ok) {
    const { failure } = accounts;
    if (failure.kind === 'unauthorized' || failure.kind === 'forbidden') {
      logger.error(`[Startup] 3Commas rejected the credentials: ${describeFailure(failure)}`);
      return { ok: false, fatal: failure };
    }
    logger.warn(`[Startup] could not list accounts, starting anyway: ${describeFailure(failure)}`);
  } else {
    const names = accounts.value.map((account) => `${account.name} (${account.id})`);
    logger.info(`[Startup] visible accounts: ${names.length === 0 ? 'none' : names.join(', ')}`);
  }

  for (const line of formatConfigSummary(config)) {
    logger.info(`[Config] ${line}`);
  }

  try {
    await notifier.notify(`BotNanny ${version} started`);
  } catch (err) {
    logger.warn(`[Startup] startup notification failed: ${formatError(err)}`);
  }

  return { ok: true, accounts: accounts.ok ? accounts.value : [] };
}

export type { StartupResult } from './types.js';
