// Progress Store
// Per-worker progress table, changed only by applying worker reports

import { computed, signal } from '@preact/signals-core';
import type { WorkerAssignment, WorkerProgress, WorkerReport } from '@/state/types';
import { TERMINAL_WORKER_STATES } from '@/state/types';

export interface ProgressTotals {
  total: number;
  completed: number;
  failed: number;
  pending: number;
  /** Completed share, 0-100 */
  percent: number;
}

export interface ProgressSnapshot {
  workers: WorkerProgress[];
  totals: ProgressTotals;
  awaitingCheckpoint: number[];
  startedAt: number | null;
  /** Remaining time in ms; null while there is no recent throughput to go by */
  etaMs: number | null;
  /** Units per second over the ETA window */
  throughput: number;
}

/**
 * Progress Store - aggregated view of a coordinator run
 */
export class ProgressStore {
  readonly workers = signal<ReadonlyMap<number, WorkerProgress>>(new Map());
  readonly startedAt = signal<number | null>(null);
  /** Completion timestamps inside the ETA window */
  readonly recentCompletions = signal<number[]>([]);

  readonly totals = computed<ProgressTotals>(() => {
    let total = 0;
    let completed = 0;
    let failed = 0;
    for (const worker of this.workers.value.values()) {
      total += worker.assigned.length;
      completed += worker.completed.size;
      failed += worker.failed.size;
    }
    return {
      total,
      completed,
      failed,
      pending: total - completed - failed,
      percent: total === 0 ? 0 : Math.round((completed / total) * 100),
    };
  });

  readonly awaitingCheckpoint = computed(() =>
    [...this.workers.value.values()].filter((w) => w.state === 'awaiting-checkpoint').map((w) => w.workerId),
  );

  constructor(private readonly etaWindowMs: number) {}

  /**
   * Register the assignments of a new run and start its clock
   */
  initialize(assignments: readonly WorkerAssignment[], now: number = Date.now()): void {
    const workers = new Map<number, WorkerProgress>();
    for (const { workerId, units } of assignments) {
      workers.set(workerId, {
        workerId,
        assigned: units.map((u) => u.index),
        completed: new Set(),
        failed: new Set(),
        currentIndex: null,
        state: 'idle',
        lastUpdate: now,
      });
    }
    this.workers.value = workers;
    this.startedAt.value = now;
    this.recentCompletions.value = [];
  }

  /**
   * Fold one worker report into the table. Reports from unregistered workers are ignored.
   */
  apply(report: WorkerReport): boolean {
    const current = this.workers.value.get(report.workerId);
    if (!current) return false;

    const next: WorkerProgress = { ...current, lastUpdate: report.at };

    switch (report.type) {
      case 'state':
        next.state = report.state;
        if (TERMINAL_WORKER_STATES.has(report.state)) next.currentIndex = null;
        break;
      case 'unit-started':
        next.currentIndex = report.index;
        break;
      case 'unit-completed': {
        const failed = new Set(current.failed);
        failed.delete(report.index);
        next.completed = new Set(current.completed).add(report.index);
        next.failed = failed;
        next.currentIndex = null;
        this.recordCompletion(report.at);
        break;
      }
      case 'unit-failed':
        next.failed = new Set(current.failed).add(report.index);
        next.currentIndex = null;
        break;
      case 'checkpoint':
        break;
      case 'fatal':
        next.error = report.error;
        break;
    }

    const workers = new Map(this.workers.value);
    workers.set(report.workerId, next);
    this.workers.value = workers;
    return true;
  }

  /**
   * Units per second: completions in the last window over the window,
   * or over the elapsed time while the run is younger than the window
   */
  throughput(now: number = Date.now()): number {
    const start = this.startedAt.value;
    if (start === null) return 0;

    const windowStart = now - this.etaWindowMs;
    const recent = this.recentCompletions.value.filter((t) => t > windowStart).length;
    const spanMs = Math.min(this.etaWindowMs, now - start);
    if (recent === 0 || spanMs <= 0) return 0;
    return recent / (spanMs / 1000);
  }

  estimateRemainingMs(now: number = Date.now()): number | null {
    const { pending } = this.totals.value;
    if (pending === 0) return 0;
    const rate = this.throughput(now);
    if (rate === 0) return null;
    return Math.round((pending / rate) * 1000);
  }

  snapshot(now: number = Date.now()): ProgressSnapshot {
    return {
      workers: [...this.workers.value.values()].sort((a, b) => a.workerId - b.workerId),
      totals: this.totals.value,
      awaitingCheckpoint: this.awaitingCheckpoint.value,
      startedAt: this.startedAt.value,
      etaMs: this.estimateRemainingMs(now),
      throughput: this.throughput(now),
    };
  }

  private recordCompletion(at: number): void {
    const windowStart = at - this.etaWindowMs;
    this.recentCompletions.value = [...this.recentCompletions.value.filter((t) => t > windowStart), at];
  }
}
