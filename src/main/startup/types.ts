import type { Notifier } from '../../services/telegramNotifier/index.js';
import type { Account, ApiFailure, BotNannyConfig, TradingPlatformClient } from '../../types/index.js';
import type { Logger } from '../../utils/logger/index.js';

/**
 * Startup dependencies
 */
export type StartupDeps = {
  readonly client: TradingPlatformClient;
  readonly notifier: Notifier;
  readonly logger: Logger;
  readonly config: BotNannyConfig;
  readonly version: string;
};

/**
 * Startup outcome.
 * `fatal` carries the credential failure that must stop the process; `accounts` is empty when
 * first contact failed for any other reason.
 */
export type StartupResult =
  | { readonly ok: true; readonly accounts: ReadonlyArray<Account> }
  | { readonly ok: false; readonly fatal: ApiFailure };
