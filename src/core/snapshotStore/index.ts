/**
 * Deal snapshot store
 *
 * Remembers, per deal, the last observation and the last applied stop loss so that a threshold
 * crossing is acted on once. Owned by the monitoring loop; each deal has one owning target.
 */
import type { Deal, DealId, Snapshot } from '../../types/index.js';
import type { ObserveResult, SnapshotStore, SnapshotStoreDeps } from './types.js';

/**
 * Creates the snapshot store
 */
export function createSnapshotStore(deps: SnapshotStoreDeps): SnapshotStore {
  const { nowMs } = deps;
  const snapshots = new Map<DealId, Snapshot>();

  function get(dealId: DealId): Snapshot | undefined {
    return snapshots.get(dealId);
  }

  function commit(dealId: DealId, snapshot: Snapshot): void {
    snapshots.set(dealId, snapshot);
  }

  function evict(dealId: DealId): void {
    snapshots.delete(dealId);
  }

  function observe(deal: Deal, targetKey: string): ObserveResult {
    const previous = snapshots.get(deal.id);
    const observedAt = nowMs();

    if (!previous) {
      const snapshot: Snapshot = {
        dealId: deal.id,
        targetKey,
        pnlPercent: deal.pnlPercent,
        stopLoss: null,
        lastActionAt: null,
        lastObservedAt: observedAt,
      };
      snapshots.set(deal.id, snapshot);
      return { snapshot, created: true, pnlChanged: true };
    }

    const snapshot: Snapshot = {
      ...previous,
      targetKey,
      pnlPercent: deal.pnlPercent,
      lastObservedAt: observedAt,
    };
    snapshots.set(deal.id, snapshot);
    return { snapshot, created: false, pnlChanged: previous.pnlPercent !== deal.pnlPercent };
  }

  function listByTarget(targetKey: string): ReadonlyArray<Snapshot> {
    const result: Snapshot[] = [];
    for (const snapshot of snapshots.values()) {
      if (snapshot.targetKey === targetKey) {
        result.push(snapshot);
      }
    }
    return result;
  }

  function retainOnly(targetKey: string, dealIds: ReadonlySet<DealId>): ReadonlyArray<DealId> {
    const evicted: DealId[] = [];
    for (const [dealId, snapshot] of snapshots) {
      if (snapshot.targetKey === targetKey && !dealIds.has(dealId)) {
        evicted.push(dealId);
      }
    }
    for (const dealId of evicted) {
      snapshots.delete(dealId);
    }
    return evicted;
  }

  return {
    get,
    commit,
    evict,
    observe,
    listByTarget,
    retainOnly,
    size: () => snapshots.size,
    clear: () => snapshots.clear(),
  };
}

export type { ObserveResult, SnapshotStore } from './types.js';
