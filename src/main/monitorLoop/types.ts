import type { RunReporter } from '../../core/runReporter/index.js';
import type { SnapshotStore } from '../../core/snapshotStore/index.js';
import type {
  ActionResult,
  ApiFailure,
  BotListingFailure,
  CycleSummary,
  Deal,
  Decision,
  ListingBudget,
  MonitorConfig,
  Target,
  TradingPlatformClient,
} from '../../types/index.js';
import type { InterruptibleDelay } from '../../utils/helpers/types.js';
import type { Logger } from '../../utils/logger/index.js';

/**
 * Current step of the loop. `stopped` once run() has returned.
 */
export type MonitorPhase = 'fetching' | 'evaluating' | 'applying' | 'reporting' | 'idle' | 'stopped';

/**
 * Monitoring loop dependencies.
 * Data source: assembled by the entry point; `delay` is injectable for tests.
 */
export type MonitorLoopDeps = {
  readonly client: TradingPlatformClient;
  readonly store: SnapshotStore;
  readonly reporter: RunReporter;
  readonly logger: Logger;
  readonly config: MonitorConfig;
  readonly nowMs: () => number;
  readonly delay?: InterruptibleDelay;
};

/**
 * Outcome of fetching one target.
 * `owned` holds the deals this target processes; `listedIds` every id it returned.
 * `failedBots` is non-empty when part of an account could not be listed.
 */
export type TargetFetch =
  | {
      readonly ok: true;
      readonly target: Target;
      readonly targetKey: string;
      readonly owned: ReadonlyArray<Deal>;
      readonly listedIds: ReadonlySet<number>;
      readonly failedBots: ReadonlyArray<BotListingFailure>;
    }
  | {
      readonly ok: false;
      readonly target: Target;
      readonly targetKey: string;
      readonly failure: ApiFailure;
    };

/**
 * Listing budget owned by the loop; `dispose` stops its timer once the listing settled.
 */
export interface TargetBudget extends ListingBudget {
  readonly dispose: () => void;
}

/**
 * A deal with its decision, pending application.
 */
export type EvaluatedDeal = {
  readonly deal: Deal;
  readonly decision: Decision;
};

/**
 * A deal with its final result, pending reporting.
 */
export type DealOutcome = {
  readonly deal: Deal;
  readonly result: ActionResult;
};

/**
 * Monitoring loop.
 */
export interface MonitorLoop {
  /** Repeats cycles until stop(); resolves after the last cycle */
  run(): Promise<void>;
  /** Runs one full cycle, Fetching to Reporting */
  runCycle(): Promise<CycleSummary>;
  /** Requests a stop; a running cycle finishes, an idle wait ends at once */
  stop(): void;
  getPhase(): MonitorPhase;
}
