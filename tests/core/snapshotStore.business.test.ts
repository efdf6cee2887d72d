/**
 * Snapshot store business tests
 */
import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { createSnapshotStore } from '../../src/core/snapshotStore/index.js';
import { createDeal } from '../../mock/factories/dealFactory.js';
import { createScenarioClock } from '../../mock/scenario/clock.js';

describe('snapshot store', () => {
  it('creates a snapshot without stop loss on first observation', () => {
    const clock = createScenarioClock(1000);
    const store = createSnapshotStore({ nowMs: clock.now });

    const result = store.observe(createDeal({ id: 5, pnlPercent: 2 }), 'bot:10');

    assert.deepEqual(result, {
      snapshot: {
        dealId: 5,
        targetKey: 'bot:10',
        pnlPercent: 2,
        stopLoss: null,
        lastActionAt: null,
        lastObservedAt: 1000,
      },
      created: true,
      pnlChanged: true,
    });
    assert.equal(store.size(), 1);
  });

  it('keeps the applied stop loss across observations', () => {
    const clock = createScenarioClock(1000);
    const store = createSnapshotStore({ nowMs: clock.now });
    store.observe(createDeal({ id: 5, pnlPercent: 4 }), 'bot:10');
    store.commit(5, {
      dealId: 5,
      targetKey: 'bot:10',
      pnlPercent: 4,
      stopLoss: 1,
      lastActionAt: 1000,
      lastObservedAt: 1000,
    });

    clock.tick(500);
    const same = store.observe(createDeal({ id: 5, pnlPercent: 4 }), 'bot:10');
    assert.equal(same.created, false);
    assert.equal(same.pnlChanged, false);

    clock.tick(500);
    const moved = store.observe(createDeal({ id: 5, pnlPercent: 6 }), 'bot:10');
    assert.equal(moved.pnlChanged, true);
    assert.deepEqual(store.get(5), {
      dealId: 5,
      targetKey: 'bot:10',
      pnlPercent: 6,
      stopLoss: 1,
      lastActionAt: 1000,
      lastObservedAt: 2000,
    });
  });

  it('evicts only the given target deals that were not listed', () => {
    const store = createSnapshotStore({ nowMs: () => 0 });
    store.observe(createDeal({ id: 1 }), 'bot:10');
    store.observe(createDeal({ id: 2 }), 'bot:10');
    store.observe(createDeal({ id: 3 }), 'bot:11');

    const evicted = store.retainOnly('bot:10', new Set([2]));

    assert.deepEqual(evicted, [1]);
    assert.equal(store.get(1), undefined);
    assert.deepEqual(
      store.listByTarget('bot:10').map((snapshot) => snapshot.dealId),
      [2],
    );
    assert.deepEqual(
      store.listByTarget('bot:11').map((snapshot) => snapshot.dealId),
      [3],
    );
  });

  it('evicts and clears', () => {
    const store = createSnapshotStore({ nowMs: () => 0 });
    store.observe(createDeal({ id: 1 }), 'bot:10');
    store.observe(createDeal({ id: 2 }), 'bot:10');

    store.evict(1);
    store.evict(99);
    assert.equal(store.size(), 1);

    store.clear();
    assert.equal(store.size(), 0);
  });
});
