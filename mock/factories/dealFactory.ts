/**
 * Deal factories
 *
 * - createDeal: a normalized Deal with overridable fields
 * - createRawDeal: a deal payload shaped like the 3Commas API answer
 */
import type { Deal } from '../../src/types/index.js';

/**
 * Builds an active deal at 0% PnL with no stop loss; pass overrides for the fields under test.
 */
export function createDeal(overrides: Partial<Deal> = {}): Deal {
  return {
    id: 1,
    botId: 10,
    accountId: 100,
    botName: 'test bot',
    pair: 'USDT_BTC',
    status: 'active',
    rawStatus: 'bought',
    pnlPercent: 0,
    currentStopLoss: null,
    trailingStopEnabled: false,
    ...overrides,
  };
}

/**
 * Builds a raw deal payload. Numeric fields are strings, as the platform sends them.
 */
export function createRawDeal(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    id: 1,
    bot_id: 10,
    account_id: 100,
    bot_name: 'test bot',
    pair: 'USDT_BTC',
    status: 'bought',
    'finished?': false,
    actual_profit_percentage: '0.0',
    stop_loss_percentage: '0.0',
    tsl_enabled: false,
    ...overrides,
  };
}
