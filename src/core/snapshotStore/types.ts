/**
 * Snapshot store types
 */
import type { Deal, DealId, Snapshot } from '../../types/index.js';

/**
 * Result of recording one observation.
 * `created` is true on first sight; `pnlChanged` compares against the previous observation.
 */
export type ObserveResult = {
  readonly snapshot: Snapshot;
  readonly created: boolean;
  readonly pnlChanged: boolean;
};

/**
 * Snapshot store dependencies
 */
export type SnapshotStoreDeps = {
  readonly nowMs: () => number;
};

/**
 * In-memory map from deal id to last known state, scoped to one run.
 */
export interface SnapshotStore {
  get(dealId: DealId): Snapshot | undefined;
  /** Records a confirmed stop loss update */
  commit(dealId: DealId, snapshot: Snapshot): void;
  evict(dealId: DealId): void;
  /** Records the latest observation; never touches `stopLoss` or `lastActionAt` */
  observe(deal: Deal, targetKey: string): ObserveResult;
  listByTarget(targetKey: string): ReadonlyArray<Snapshot>;
  /** Evicts this target's snapshots whose deal is not in `dealIds`; returns the evicted ids */
  retainOnly(targetKey: string, dealIds: ReadonlySet<DealId>): ReadonlyArray<DealId>;
  size(): number;
  clear(): void;
}
