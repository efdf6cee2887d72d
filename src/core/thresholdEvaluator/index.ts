/**
 * Threshold evaluator
 *
 * Pure decision for one deal, in order:
 * 1. not active -> skip "inactive"
 * 2. trailing stop enabled -> skip "trailing stop enabled" (a trailing stop is never overridden)
 * 3. no rule with pnl >= minPnlPercent -> skip "below threshold"
 * 4. the matching rule with the highest minPnlPercent gives the candidate stop loss
 * 5. max(applied stop loss, remote stop loss) >= candidate -> skip "already applied"
 * 6. otherwise apply the candidate
 *
 * Observed values are rounded to `pnlPrecision` decimal places before they meet a rule value;
 * rule values are never rounded.
 */
import type { Decision, Deal, Rule, Snapshot } from '../../types/index.js';
import { isAtLeast } from '../../utils/decimal/index.js';
import type { EvaluateOptions } from './types.js';
import { effectiveStopLoss } from './utils.js';

/**
 * Picks the strongest matching rule, or null when PnL is below every threshold.
 */
export function selectRule(
  pnlPercent: number,
  rules: ReadonlyArray<Rule>,
  pnlPrecision: number,
): Rule | null {
  let selected: Rule | null = null;
  for (const rule of rules) {
    if (!isAtLeast(pnlPercent, rule.minPnlPercent, pnlPrecision)) {
      continue;
    }
    if (selected === null || rule.minPnlPercent > selected.minPnlPercent) {
      selected = rule;
    }
  }
  return selected;
}

export function evaluate(
  deal: Deal,
  snapshot: Snapshot | undefined,
  rules: ReadonlyArray<Rule>,
  { pnlPrecision }: EvaluateOptions,
): Decision {
  if (deal.status !== 'active') {
    return { kind: 'skip', reason: 'inactive' };
  }
  if (deal.trailingStopEnabled) {
    return { kind: 'skip', reason: 'trailing stop enabled' };
  }

  const rule = selectRule(deal.pnlPercent, rules, pnlPrecision);
  if (rule === null) {
    return { kind: 'skip', reason: 'below threshold' };
  }

  const current = effectiveStopLoss(snapshot?.stopLoss ?? null, deal.currentStopLoss);
  if (current !== null && isAtLeast(current, rule.newStopLossPercent, pnlPrecision)) {
    return { kind: 'skip', reason: 'already applied' };
  }

  return { kind: 'apply', stopLossPercent: rule.newStopLossPercent, rule };
}

export type { EvaluateOptions } from './types.js';
