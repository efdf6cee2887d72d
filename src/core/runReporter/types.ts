import type { ActionResult, ApiFailure, CycleSummary, Deal, DealId } from '../../types/index.js';
import type { Notifier } from '../../services/telegramNotifier/index.js';
import type { Logger } from '../../utils/logger/index.js';

/**
 * Structured event emitted once per ActionResult.
 */
export type ReportEvent = {
  readonly dealId: DealId;
  readonly decision: ActionResult['kind'];
  readonly detail: string;
  readonly timestamp: number;
};

/**
 * Run reporter dependencies
 */
export type RunReporterDeps = {
  readonly logger: Logger;
  readonly notifier: Notifier;
  readonly nowMs: () => number;
  /** Last resort when the logger itself throws; defaults to stderr */
  readonly writeFallback?: (line: string) => void;
};

/**
 * Surfaces outcomes to the logger and the notifier. Never throws.
 */
export interface RunReporter {
  /** `deal` adds the pair and bot name to the messages when known */
  report(dealId: DealId, result: ActionResult, deal?: Deal): ReportEvent;
  reportTargetFailure(targetKey: string, failure: ApiFailure): void;
  reportCycle(summary: CycleSummary): void;
  escalate(message: string): void;
  /** Resolves once every notification sent so far has settled */
  flush(): Promise<void>;
}
