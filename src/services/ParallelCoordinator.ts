// Parallel Coordinator
// Splits units over isolated worker sessions, supervises them and summarizes the run

import type { AppConfig, CheckpointMode } from '@/config';
import { targetUnitsPerWorker } from '@/config';
import type { WorkerAssignment, WorkerReport, WorkUnit } from '@/state/types';
import { ProgressStore } from '@/stores/ProgressStore';
import type { IAudioSink, ICheckpointHandler, ILogger, IManifestWriter, ITTSSessionFactory } from './interfaces';
import type { LoggerStore } from './Logger';
import { describeDistribution, distributeRoundRobin } from './ChunkDistributor';
import { DashboardWriter, renderDashboard } from './DashboardRenderer';
import { WorkerSession, type WorkerResult } from './WorkerSession';
import { delay } from '@/utils/delay';
import { invalidConfigError, isCancellationError } from '@/errors';

export type WorkerCount = number | 'auto';

export interface CoordinatorDeps {
  config: AppConfig;
  voice: string;
  sessionFactory: ITTSSessionFactory;
  sink: IAudioSink;
  manifest: IManifestWriter;
  checkpointHandler: ICheckpointHandler;
  logger?: ILogger;
  /** Source of the dashboard's recent-alerts footer */
  loggerStore?: LoggerStore;
  /** null turns the periodic dashboard off */
  writer?: DashboardWriter | null;
  now?: () => number;
}

export interface CoordinatorRunOptions {
  workerCount: WorkerCount;
  checkpointMode?: CheckpointMode;
  signal?: AbortSignal;
  /** Dashboard title */
  title?: string;
  /** Sees every worker report after the progress store has applied it */
  onReport?: (report: WorkerReport) => void;
}

export interface RunSummary {
  completed: number[];
  failed: number[];
  /** Assigned but neither completed nor failed */
  missing: number[];
  workerCount: number;
  workersSucceeded: number;
  workersFailed: number;
  workersCancelled: number;
  workers: WorkerResult[];
  durationMs: number;
  success: boolean;
}

const DASHBOARD_ALERTS = 3;

/**
 * Worker count for a run: one worker per targetUnitsPerWorker units, capped at maxWorkers
 */
export function computeOptimalWorkers(totalUnits: number, config: AppConfig): number {
  const { maxWorkers, autoCalculateWorkers, defaultWorkers } = config.parallel;
  if (!autoCalculateWorkers) return Math.max(1, Math.min(defaultWorkers, maxWorkers));
  return Math.max(1, Math.min(Math.ceil(totalUnits / targetUnitsPerWorker(config)), maxWorkers));
}

export class ParallelCoordinator {
  private readonly now: () => number;
  private readonly writer: DashboardWriter | null;

  constructor(private readonly deps: CoordinatorDeps) {
    this.now = deps.now ?? Date.now;
    this.writer = deps.writer === undefined ? new DashboardWriter() : deps.writer;
  }

  resolveWorkerCount(workerCount: WorkerCount, totalUnits: number): number {
    if (workerCount === 'auto') {
      return Math.min(computeOptimalWorkers(totalUnits, this.deps.config), Math.max(1, totalUnits));
    }
    if (!Number.isInteger(workerCount) || workerCount <= 0) {
      throw invalidConfigError(`workerCount must be 'auto' or a positive integer, got ${workerCount}`);
    }
    return Math.min(workerCount, Math.max(1, totalUnits));
  }

  async run(units: readonly WorkUnit[], options: CoordinatorRunOptions): Promise<RunSummary> {
    const { config, logger } = this.deps;
    const mode = options.checkpointMode ?? config.parallel.checkpointMode;
    const signal = options.signal ?? new AbortController().signal;
    const startedAt = this.now();

    const workerCount = this.resolveWorkerCount(options.workerCount, units.length);
    if (units.length === 0) {
      return this.summarize([], 0, startedAt);
    }

    const assignments = distributeRoundRobin(units, workerCount);
    logger?.info(`Distributing ${units.length} units over ${workerCount} workers (${mode})`);
    for (const line of describeDistribution(assignments)) {
      logger?.info(line);
    }

    const store = new ProgressStore(config.parallel.etaWindowMs);
    store.initialize(assignments, startedAt);

    const sessions = assignments.map((assignment) => this.createWorker(assignment, store, signal, options));

    const render = this.createRenderer(store, options.title);
    const timer = this.writer ? setInterval(render, config.parallel.renderIntervalMs) : null;

    let results: WorkerResult[];
    try {
      results = await this.launch(sessions, mode, signal);
    } finally {
      if (timer) clearInterval(timer);
    }
    render();

    const summary = this.summarize(results, workerCount, startedAt);
    logger?.info(
      `Run finished: ${summary.completed.length} completed, ${summary.failed.length} failed, ${summary.missing.length} missing`,
    );
    return summary;
  }

  private createWorker(
    assignment: WorkerAssignment,
    store: ProgressStore,
    signal: AbortSignal,
    options: CoordinatorRunOptions,
  ): WorkerSession {
    const { config, voice, sessionFactory, sink, manifest, checkpointHandler, logger } = this.deps;

    return new WorkerSession({
      assignment,
      voice,
      checkpointThreshold: config.budget.checkpointThreshold,
      worker: config.worker,
      sessionFactory,
      sink,
      manifest,
      checkpointHandler,
      signal,
      logger: logger?.child?.(`worker-${assignment.workerId}`) ?? logger,
      now: this.now,
      report: (report) => {
        store.apply(report);
        options.onReport?.(report);
      },
    });
  }

  /**
   * Start workers according to the checkpoint coordination mode
   */
  private async launch(sessions: WorkerSession[], mode: CheckpointMode, signal: AbortSignal): Promise<WorkerResult[]> {
    const { staggerIntervalMs, batchSize } = this.deps.config.parallel;

    switch (mode) {
      case 'all-at-once':
        return Promise.all(sessions.map((session) => session.run()));

      case 'staggered':
        return Promise.all(sessions.map((session, k) => this.startAfter(session, k * staggerIntervalMs, signal)));

      case 'batched': {
        const results: WorkerResult[] = [];
        for (let start = 0; start < sessions.length; start += batchSize) {
          const batch = sessions.slice(start, start + batchSize);
          this.deps.logger?.info(
            `Starting batch ${start / batchSize + 1}: workers ${batch.map((s) => `#${s.workerId}`).join(', ')}`,
          );
          results.push(...(await Promise.all(batch.map((session) => session.run()))));
        }
        return results;
      }
    }
  }

  private async startAfter(session: WorkerSession, startDelayMs: number, signal: AbortSignal): Promise<WorkerResult> {
    try {
      await delay(startDelayMs, signal);
    } catch (error: unknown) {
      // An aborted wait still runs the worker, which then ends cancelled at once
      if (!isCancellationError(error)) throw error;
    }
    return session.run();
  }

  /**
   * Redraws the dashboard in place, except over output it did not write:
   * log lines printed since the last frame, and checkpoint prompts. While
   * workers wait at a checkpoint the frame is drawn once below the prompt and
   * held until the set of waiting workers changes.
   */
  private createRenderer(store: ProgressStore, title?: string): () => void {
    const writer = this.writer;
    if (!writer) return () => {};

    let lastLogId = this.latestLogId();
    let heldFor = '';

    return () => {
      const now = this.now();
      const snapshot = store.snapshot(now);

      const logId = this.latestLogId();
      if (logId !== lastLogId) {
        writer.release();
        lastLogId = logId;
      }

      const waiting = snapshot.awaitingCheckpoint.join(',');
      if (waiting !== '' && waiting === heldFor) return;
      if (waiting !== '') writer.release();
      heldFor = waiting;

      writer.write(
        renderDashboard(snapshot, now, {
          title,
          alerts: this.deps.loggerStore?.recentAlerts(DASHBOARD_ALERTS),
        }),
      );
      if (waiting !== '') writer.release();
    };
  }

  private latestLogId(): string | undefined {
    return this.deps.loggerStore?.entries.value.at(-1)?.id;
  }

  private summarize(results: WorkerResult[], workerCount: number, startedAt: number): RunSummary {
    const byIndex = (a: number, b: number) => a - b;
    const missing = results.flatMap((r) => r.unattempted).sort(byIndex);

    return {
      completed: results.flatMap((r) => r.completed).sort(byIndex),
      failed: results.flatMap((r) => r.failed).sort(byIndex),
      missing,
      workerCount,
      workersSucceeded: results.filter((r) => r.state === 'done').length,
      workersFailed: results.filter((r) => r.state === 'failed').length,
      workersCancelled: results.filter((r) => r.state === 'cancelled').length,
      workers: results,
      durationMs: this.now() - startedAt,
      success: missing.length === 0,
    };
  }
}
