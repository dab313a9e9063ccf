import { beforeEach, describe, expect, it } from 'vitest';
import { createTestUnits } from '@/test/factories/workUnitFactory';
import { distributeRoundRobin } from '@/services/ChunkDistributor';
import { ProgressStore } from './ProgressStore';

describe('ProgressStore', () => {
  let store: ProgressStore;

  beforeEach(() => {
    store = new ProgressStore(60_000);
    store.initialize(distributeRoundRobin(createTestUnits(10), 2), 0);
  });

  describe('initialize', () => {
    it('registers every worker idle with its assigned indices', () => {
      const worker = store.workers.value.get(2);

      expect(worker?.state).toBe('idle');
      expect(worker?.assigned).toEqual([1, 3, 5, 7, 9]);
      expect(store.totals.value).toEqual({ total: 10, completed: 0, failed: 0, pending: 10, percent: 0 });
    });
  });

  describe('apply', () => {
    it('tracks the unit in flight', () => {
      store.apply({ type: 'unit-started', workerId: 1, index: 4, attempt: 1, at: 100 });

      expect(store.workers.value.get(1)?.currentIndex).toBe(4);
      expect(store.workers.value.get(1)?.lastUpdate).toBe(100);
    });

    it('counts completions and failures', () => {
      store.apply({ type: 'unit-completed', workerId: 1, index: 0, at: 100 });
      store.apply({ type: 'unit-completed', workerId: 2, index: 1, at: 200 });
      store.apply({ type: 'unit-failed', workerId: 2, index: 3, error: 'gave up after 3 attempts', at: 300 });

      expect(store.totals.value).toEqual({ total: 10, completed: 2, failed: 1, pending: 7, percent: 20 });
      expect(store.workers.value.get(2)?.currentIndex).toBeNull();
    });

    it('does not mutate the previous table', () => {
      const before = store.workers.value;
      store.apply({ type: 'unit-completed', workerId: 1, index: 0, at: 100 });

      expect(before.get(1)?.completed.size).toBe(0);
      expect(store.workers.value).not.toBe(before);
    });

    it('lists workers waiting on a checkpoint', () => {
      store.apply({ type: 'state', workerId: 2, state: 'awaiting-checkpoint', at: 100 });

      expect(store.awaitingCheckpoint.value).toEqual([2]);

      store.apply({ type: 'state', workerId: 2, state: 'working', at: 200 });
      expect(store.awaitingCheckpoint.value).toEqual([]);
    });

    it('keeps the error of a fatal worker', () => {
      store.apply({ type: 'fatal', workerId: 1, error: 'Worker #1 stopped: boom', at: 100 });
      store.apply({ type: 'state', workerId: 1, state: 'failed', at: 100 });

      expect(store.workers.value.get(1)).toMatchObject({ state: 'failed', error: 'Worker #1 stopped: boom' });
    });

    it('ignores reports from unknown workers', () => {
      expect(store.apply({ type: 'unit-completed', workerId: 9, index: 0, at: 100 })).toBe(false);
      expect(store.totals.value.completed).toBe(0);
    });
  });

  describe('ETA', () => {
    it('is unknown before the first completion', () => {
      expect(store.estimateRemainingMs(5_000)).toBeNull();
    });

    it('divides by elapsed time while the run is younger than the window', () => {
      store.apply({ type: 'unit-completed', workerId: 1, index: 0, at: 5_000 });
      store.apply({ type: 'unit-completed', workerId: 2, index: 1, at: 10_000 });

      // 2 units in 10 s, 8 to go
      expect(store.throughput(10_000)).toBe(0.2);
      expect(store.estimateRemainingMs(10_000)).toBe(40_000);
    });

    it('only counts completions inside the window', () => {
      store.apply({ type: 'unit-completed', workerId: 1, index: 0, at: 10_000 });
      store.apply({ type: 'unit-completed', workerId: 2, index: 1, at: 100_000 });
      store.apply({ type: 'unit-completed', workerId: 1, index: 2, at: 110_000 });

      // 2 units in the last 60 s, 7 to go
      expect(store.estimateRemainingMs(120_000)).toBe(210_000);
    });

    it('is zero once nothing is pending', () => {
      const small = new ProgressStore(60_000);
      small.initialize(distributeRoundRobin(createTestUnits(1), 1), 0);
      small.apply({ type: 'unit-failed', workerId: 1, index: 0, error: 'gave up after 3 attempts', at: 100 });

      expect(small.estimateRemainingMs(200)).toBe(0);
    });
  });

  describe('snapshot', () => {
    it('lists workers by id with totals and ETA', () => {
      store.apply({ type: 'unit-completed', workerId: 2, index: 1, at: 1_000 });
      const snapshot = store.snapshot(2_000);

      expect(snapshot.workers.map((w) => w.workerId)).toEqual([1, 2]);
      expect(snapshot.totals.completed).toBe(1);
      expect(snapshot.startedAt).toBe(0);
      expect(snapshot.throughput).toBe(0.5);
      expect(snapshot.etaMs).toBe(18_000);
    });
  });
});
