/**
 * @module monitorLoop
 * @description Periodic polling loop
 *
 * Per cycle: Fetching -> Evaluating -> Applying -> Reporting -> Idle
 *
 * - Fetching: every target is listed concurrently under its own time budget, which does not run
 *   while the target queues at the rate limiter; a failed target is isolated. A deal listed by
 *   several targets belongs to the first one in configuration order. After a complete listing,
 *   snapshots of deals the target no longer lists are evicted; a listing with failed bots evicts
 *   nothing.
 * - Evaluating: observe, then evaluate each owned deal; non-active deals are evicted afterwards.
 * - Applying: targets run concurrently, deals inside a target one after another. Ack commits the
 *   snapshot, notFound skips and evicts, any other failure leaves the snapshot untouched.
 * - Reporting: one result per processed deal; a failed target reports every deal cached under it,
 *   or one target-level failure when nothing is cached.
 * - Idle: waits for the interval; stop() ends the wait but never interrupts a cycle.
 *
 * When every target fails for `escalateAfterCycles` consecutive cycles the reporter escalates.
 */
import { evaluate } from '../../core/thresholdEvaluator/index.js';
import type { ActionResult, ApiResult, CycleSummary, DealListing, Target } from '../../types/index.js';
import { formatError } from '../../utils/error/index.js';
import { createInterruptibleDelay } from '../../utils/helpers/index.js';
import type {
  DealOutcome,
  EvaluatedDeal,
  MonitorLoop,
  MonitorLoopDeps,
  MonitorPhase,
  TargetFetch,
} from './types.js';
import {
  assignOwnership,
  createTargetBudget,
  createTargetTimeoutFailure,
  createUnexpectedFailure,
} from './utils.js';

export function createMonitorLoop(deps: MonitorLoopDeps): MonitorLoop {
  const { client, store, reporter, logger, config, nowMs } = deps;
  const delay = deps.delay ?? createInterruptibleDelay();

  let phase: MonitorPhase = 'idle';
  let cycle = 0;
  let consecutiveAllFailed = 0;
  let stopRequested = false;

  async function fetchTarget(target: Target): Promise<ApiResult<DealListing>> {
    let expire: () => void = () => {};
    const expired = new Promise<ApiResult<DealListing>>((resolve) => {
      expire = () => resolve({ ok: false, failure: createTargetTimeoutFailure(config.targetTimeoutMs) });
    });
    const budget = createTargetBudget(config.targetTimeoutMs, () => expire());

    try {
      const listing = client
        .listDeals(target, budget)
        .catch((err: unknown): ApiResult<DealListing> => ({ ok: false, failure: createUnexpectedFailure(err) }));
      return await Promise.race([listing, expired]);
    } finally {
      budget.dispose();
    }
  }

  function evaluateTarget(entry: TargetFetch & { ok: true }): EvaluatedDeal[] {
    if (entry.failedBots.length === 0) {
      store.retainOnly(entry.targetKey, entry.listedIds);
    } else {
      logger.debug(`[Monitor] ${entry.targetKey} listed partially, keeping its snapshots`);
    }

    const evaluated: EvaluatedDeal[] = [];
    for (const deal of entry.owned) {
      const observed = store.observe(deal, entry.targetKey);
      if (observed.created) {
        logger.debug(`[Monitor] deal ${deal.id} first seen under ${entry.targetKey}, PnL ${deal.pnlPercent}%`);
      } else if (observed.pnlChanged) {
        logger.debug(`[Monitor] deal ${deal.id} PnL now ${deal.pnlPercent}%`);
      }
      const decision = evaluate(deal, observed.snapshot, config.rules, {
        pnlPrecision: config.pnlPrecision,
      });
      if (deal.status !== 'active') {
        store.evict(deal.id);
      }
      evaluated.push({ deal, decision });
    }
    return evaluated;
  }

  async function applyDecision(targetKey: string, { deal, decision }: EvaluatedDeal): Promise<ActionResult> {
    if (decision.kind === 'skip') {
      return { kind: 'skipped', reason: decision.reason };
    }

    const ack = await client
      .updateDealStopLoss(deal.id, decision.stopLossPercent)
      .catch((err: unknown): ApiResult<never> => ({ ok: false, failure: createUnexpectedFailure(err) }));

    if (ack.ok) {
      const now = nowMs();
      store.commit(deal.id, {
        dealId: deal.id,
        targetKey,
        pnlPercent: deal.pnlPercent,
        stopLoss: ack.value.stopLossPercent,
        lastActionAt: now,
        lastObservedAt: store.get(deal.id)?.lastObservedAt ?? now,
      });
      return { kind: 'applied', stopLossPercent: ack.value.stopLossPercent };
    }
    if (ack.failure.kind === 'notFound') {
      store.evict(deal.id);
      return { kind: 'skipped', reason: 'not found' };
    }
    return { kind: 'failed', failure: ack.failure };
  }

  async function applyTarget(targetKey: string, evaluated: ReadonlyArray<EvaluatedDeal>): Promise<DealOutcome[]> {
    const outcomes: DealOutcome[] = [];
    for (const item of evaluated) {
      outcomes.push({ deal: item.deal, result: await applyDecision(targetKey, item) });
    }
    return outcomes;
  }

  async function runCycle(): Promise<CycleSummary> {
    cycle += 1;
    const startedAt = nowMs();

    phase = 'fetching';
    const listings = await Promise.all(config.targets.map((target) => fetchTarget(target)));
    const fetches = assignOwnership(config.targets, listings);

    phase = 'evaluating';
    const evaluatedByTarget = fetches.map((entry) => ({
      targetKey: entry.targetKey,
      evaluated: entry.ok ? evaluateTarget(entry) : [],
    }));

    phase = 'applying';
    const outcomesByTarget = await Promise.all(
      evaluatedByTarget.map(({ targetKey, evaluated }) => applyTarget(targetKey, evaluated)),
    );

    phase = 'reporting';
    let applied = 0;
    let skipped = 0;
    let failed = 0;
    let dealsProcessed = 0;
    const failedTargets: string[] = [];

    const count = (result: ActionResult): void => {
      dealsProcessed += 1;
      if (result.kind === 'applied') {
        applied += 1;
      } else if (result.kind === 'skipped') {
        skipped += 1;
      } else {
        failed += 1;
      }
    };

    fetches.forEach((entry, index) => {
      if (!entry.ok) {
        failedTargets.push(entry.targetKey);
        const cached = store.listByTarget(entry.targetKey);
        if (cached.length === 0) {
          reporter.reportTargetFailure(entry.targetKey, entry.failure);
          return;
        }
        for (const snapshot of cached) {
          const result: ActionResult = { kind: 'failed', failure: entry.failure };
          reporter.report(snapshot.dealId, result);
          count(result);
        }
        return;
      }
      for (const { botId, failure } of entry.failedBots) {
        reporter.reportTargetFailure(`${entry.targetKey}/bot:${botId}`, failure);
      }
      for (const { deal, result } of outcomesByTarget[index] ?? []) {
        reporter.report(deal.id, result, deal);
        count(result);
      }
    });

    const allFailed = config.targets.length > 0 && failedTargets.length === config.targets.length;
    consecutiveAllFailed = allFailed ? consecutiveAllFailed + 1 : 0;
    if (allFailed && consecutiveAllFailed % config.escalateAfterCycles === 0) {
      reporter.escalate(`all ${config.targets.length} target(s) failed for ${consecutiveAllFailed} consecutive cycles`);
    }

    const summary: CycleSummary = {
      cycle,
      startedAt,
      durationMs: nowMs() - startedAt,
      dealsProcessed,
      applied,
      skipped,
      failed,
      failedTargets,
    };
    reporter.reportCycle(summary);

    phase = 'idle';
    return summary;
  }

  async function run(): Promise<void> {
    logger.info(`[Monitor] started, ${config.targets.length} target(s), interval ${config.intervalMs}ms`);
    while (!stopRequested) {
      try {
        await runCycle();
      } catch (err) {
        logger.error(`[Monitor] cycle ${cycle} failed unexpectedly: ${formatError(err)}`);
      }
      if (stopRequested) {
        break;
      }
      phase = 'idle';
      logger.debug(`[Monitor] sleeping ${config.intervalMs}ms`);
      await delay.wait(config.intervalMs);
    }
    phase = 'stopped';
    logger.info('[Monitor] stopped');
  }

  function stop(): void {
    if (stopRequested) {
      return;
    }
    stopRequested = true;
    delay.interrupt();
  }

  return {
    run,
    runCycle,
    stop,
    getPhase: () => phase,
  };
}

export { buildTargetKey } from './utils.js';
export type { MonitorLoop, MonitorPhase } from './types.js';
