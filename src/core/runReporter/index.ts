/**
 * Run reporter
 *
 * Emits one structured event per ActionResult: info for applied, debug for skipped, error for
 * failed. Applied and failed results and escalations also go to the notifier. No reporting error
 * reaches the loop: notification errors are logged, and a throwing log sink falls back to a raw
 * stderr line.
 */
import type { ActionResult, ApiFailure, CycleSummary, Deal, DealId } from '../../types/index.js';
import { formatError } from '../../utils/error/index.js';
import type { ReportEvent, RunReporter, RunReporterDeps } from './types.js';
import { describeFailure, describeResult, formatDealLabel } from './utils.js';

export function createRunReporter(deps: RunReporterDeps): RunReporter {
  const { logger, notifier, nowMs } = deps;
  const writeFallback = deps.writeFallback ?? ((line: string) => process.stderr.write(line));
  const pending = new Set<Promise<void>>();

  function safely(context: string, action: () => void): void {
    try {
      action();
    } catch (err) {
      writeFallback(`[Reporter] ${context} failed: ${formatError(err)}\n`);
    }
  }

  function send(message: string): void {
    if (!notifier.enabled) {
      return;
    }
    safely('notification', () => {
      const delivery = notifier
        .notify(message)
        .catch((err: unknown) => {
          safely('notification log', () => logger.warn(`[Reporter] notification failed: ${formatError(err)}`));
        })
        .finally(() => {
          pending.delete(delivery);
        });
      pending.add(delivery);
    });
  }

  function report(dealId: DealId, result: ActionResult, deal?: Deal): ReportEvent {
    const detail = describeResult(formatDealLabel(dealId, deal), result);
    const event: ReportEvent = {
      dealId,
      decision: result.kind,
      detail,
      timestamp: nowMs(),
    };

    switch (result.kind) {
      case 'applied':
        safely(`report of deal ${dealId}`, () => logger.info(detail, event));
        send(detail);
        break;
      case 'skipped':
        safely(`report of deal ${dealId}`, () => logger.debug(detail, event));
        break;
      case 'failed':
        safely(`report of deal ${dealId}`, () => logger.error(detail, event));
        send(detail);
        break;
    }
    return event;
  }

  function reportTargetFailure(targetKey: string, failure: ApiFailure): void {
    safely(`report of target ${targetKey}`, () =>
      logger.error(`[Monitor] target ${targetKey} failed: ${describeFailure(failure)}`, {
        targetKey,
        failure,
        timestamp: nowMs(),
      }),
    );
  }

  function reportCycle(summary: CycleSummary): void {
    const failedTargets = summary.failedTargets.length === 0 ? '' : `, failed targets: ${summary.failedTargets.join(', ')}`;
    safely(`summary of cycle ${summary.cycle}`, () =>
      logger.info(
        `[Monitor] cycle ${summary.cycle} done in ${summary.durationMs}ms: ${summary.dealsProcessed} deals, ` +
          `${summary.applied} applied, ${summary.skipped} skipped, ${summary.failed} failed${failedTargets}`,
      ),
    );
  }

  function escalate(message: string): void {
    safely('escalation', () => logger.error(`[Escalation] ${message}`));
    send(`Escalation: ${message}`);
  }

  async function flush(): Promise<void> {
    while (pending.size > 0) {
      await Promise.all([...pending]);
    }
  }

  return {
    report,
    reportTargetFailure,
    reportCycle,
    escalate,
    flush,
  };
}

export type { ReportEvent, RunReporter } from './types.js';
