import type { BotNannyConfig, Rule } from '../../types/index.js';
import { TIME } from '../../constants/index.js';
import { formatNumber } from '../../utils/helpers/index.js';
import { buildTargetKey } from '../monitorLoop/index.js';

/**
 * Banner and risk notice shown at startup.
 */
export function buildBannerLines(version: string): string[] {
  return [
    `BotNanny ${version}`,
    'Tightens the stop loss of open 3Commas deals once their PnL crosses a threshold.',
    'Use at your own risk: every update is a live change to your deals.',
  ];
}

export function formatRule(rule: Rule): string {
  return `PnL >= ${formatNumber(rule.minPnlPercent)}% -> SL ${formatNumber(rule.newStopLossPercent)}%`;
}

/**
 * Active configuration without secrets.
 */
export function formatConfigSummary(config: BotNannyConfig): string[] {
  const { monitor, threeCommas, telegram } = config;
  return [
    `Targets: ${monitor.targets.map(buildTargetKey).join(', ')}`,
    `Rules: ${monitor.rules.map(formatRule).join('; ')}`,
    `Interval: ${monitor.intervalMs / TIME.MILLISECONDS_PER_SECOND}s, target timeout ${monitor.targetTimeoutMs}ms`,
    `API: ${threeCommas.baseUrl}, timeout ${threeCommas.timeoutMs}ms, ${threeCommas.retry.maxAttempts} attempt(s)`,
    `Telegram: ${telegram === null ? 'disabled' : 'enabled'}`,
  ];
}
