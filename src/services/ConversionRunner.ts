// Conversion Runner
// One full run: resume planning, worker count, safety probe, parallel run, final report

import type { AppConfig, CheckpointMode } from '@/config';
import type { WorkUnit } from '@/state/types';
import type { IAudioSink, ICheckpointHandler, ILogger, ITTSSessionFactory } from './interfaces';
import type { LoggerStore } from './Logger';
import { formatElapsedTime } from './Logger';
import type { DashboardWriter } from './DashboardRenderer';
import { FileAudioSink } from './FileAudioSink';
import { ManifestStore } from './ManifestStore';
import { ParallelCoordinator, type WorkerCount } from './ParallelCoordinator';
import { computeResumePlan, ResumePlanner } from './ResumePlanner';
import { SafetyProbe } from './SafetyProbe';
import { assertDenseUnits } from './WorkUnits';
import { getErrorMessage, invalidWorkUnitsError, isCancellationError } from '@/errors';

export type RunStatus = 'complete' | 'incomplete' | 'already-complete' | 'cancelled';

export type ProbeOutcome = 'skipped' | 'passed' | 'failed';

export interface RunReport {
  status: RunStatus;
  outputDir: string;
  totalUnits: number;
  completed: number;
  failedIndices: number[];
  missingIndices: number[];
  /** Workers of the main run; 0 when the probe or an earlier run left nothing to convert */
  workerCount: number;
  workersFailed: number;
  probe: ProbeOutcome;
  probeFailure?: string;
  durationMs: number;
}

export interface ConversionRunOptions {
  units: readonly WorkUnit[];
  outputDir: string;
  voice: string;
  workerCount?: WorkerCount;
  checkpointMode?: CheckpointMode;
  /** Ignore the manifest and any audio already on disk */
  fresh?: boolean;
  signal?: AbortSignal;
}

export interface ConversionRunnerDeps {
  config: AppConfig;
  sessionFactory: ITTSSessionFactory;
  checkpointHandler: ICheckpointHandler;
  /** Defaults to files under the output directory */
  createSink?: (outputDir: string) => IAudioSink;
  logger?: ILogger;
  loggerStore?: LoggerStore;
  writer?: DashboardWriter | null;
  now?: () => number;
}

export class ConversionRunner {
  private readonly now: () => number;

  constructor(private readonly deps: ConversionRunnerDeps) {
    this.now = deps.now ?? Date.now;
  }

  async run(options: ConversionRunOptions): Promise<RunReport> {
    const { config, logger } = this.deps;
    const { units, outputDir, fresh = false } = options;
    const signal = options.signal ?? new AbortController().signal;
    const startedAt = this.now();
    this.deps.loggerStore?.startTimer(startedAt);

    if (units.length === 0) {
      throw invalidWorkUnitsError('no chunks to convert');
    }
    assertDenseUnits(units);

    const sink = this.deps.createSink?.(outputDir) ?? new FileAudioSink(outputDir);
    const plan = await new ResumePlanner({ sink, logger }).plan(units, outputDir, { fresh });
    const manifest = await ManifestStore.open(outputDir, units.length, {
      fresh,
      seedCompleted: plan.source === 'artifacts' ? plan.completed : [],
      logger,
    });

    if (plan.alreadyComplete) {
      return this.buildReport('already-complete', manifest, startedAt, {
        workerCount: 0,
        workersFailed: 0,
        probe: 'skipped',
      });
    }

    const coordinator = new ParallelCoordinator({
      config,
      voice: options.voice,
      sessionFactory: this.deps.sessionFactory,
      sink,
      manifest,
      checkpointHandler: this.deps.checkpointHandler,
      logger,
      loggerStore: this.deps.loggerStore,
      writer: this.deps.writer,
      now: this.now,
    });

    let workerCount = coordinator.resolveWorkerCount(options.workerCount ?? 'auto', plan.missing.length);
    let pending = plan.missing;
    let probe: ProbeOutcome = 'skipped';
    let probeFailure: string | undefined;

    try {
      if (workerCount > 1 && config.safetyProbe.enabled) {
        const result = await new SafetyProbe({ coordinator, config, logger }).run(pending, signal);
        if (result.passed) {
          probe = 'passed';
        } else {
          probe = 'failed';
          probeFailure = result.error ? getErrorMessage(result.error) : 'unknown reason';
          logger?.warn(`Safety probe failed (${probeFailure}); continuing with a single worker`);
          workerCount = 1;
        }
        pending = computeResumePlan(units, manifest.completedIndices(), manifest.failedIndices(), 'manifest').missing;
        if (result.passed) {
          workerCount = coordinator.resolveWorkerCount(options.workerCount ?? 'auto', pending.length);
        }
      }
    } catch (error: unknown) {
      // A cancelled probe ends the run as cancelled below
      if (!isCancellationError(error)) throw error;
    }

    let ranWorkers = 0;
    let workersFailed = 0;
    if (pending.length > 0 && !signal.aborted) {
      const summary = await coordinator.run(pending, {
        workerCount,
        checkpointMode: options.checkpointMode,
        signal,
      });
      ranWorkers = summary.workerCount;
      workersFailed = summary.workersFailed;
    }

    await manifest.flush();

    const status: RunStatus = signal.aborted
      ? 'cancelled'
      : manifest.completedIndices().length === units.length
        ? 'complete'
        : 'incomplete';
    return this.buildReport(status, manifest, startedAt, {
      workerCount: ranWorkers,
      workersFailed,
      probe,
      probeFailure,
    });
  }

  private buildReport(
    status: RunStatus,
    manifest: ManifestStore,
    startedAt: number,
    run: Pick<RunReport, 'workerCount' | 'workersFailed' | 'probe' | 'probeFailure'>,
  ): RunReport {
    const report: RunReport = {
      status,
      outputDir: manifest.outputDir,
      totalUnits: manifest.totalUnits,
      completed: manifest.completedIndices().length,
      failedIndices: manifest.failedIndices(),
      missingIndices: manifest.missingIndices(),
      ...run,
      durationMs: this.now() - startedAt,
    };
    this.deps.logger?.info(
      `Run ${status}: ${report.completed}/${report.totalUnits} completed, ${report.failedIndices.length} failed, ${report.missingIndices.length} missing`,
    );
    return report;
  }
}

/**
 * Compact index list: consecutive runs collapse to "a-b"
 */
export function formatIndexList(indices: readonly number[]): string {
  const sorted = [...indices].sort((a, b) => a - b);
  const parts: string[] = [];
  let start = 0;
  for (let i = 1; i <= sorted.length; i++) {
    if (i < sorted.length && sorted[i] === sorted[i - 1] + 1) continue;
    const first = sorted[start];
    const last = sorted[i - 1];
    parts.push(first === last ? String(first) : `${first}-${last}`);
    start = i;
  }
  return parts.join(', ');
}

const STATUS_HEADLINES: Record<RunStatus, string> = {
  complete: 'Conversion complete',
  incomplete: 'Conversion incomplete',
  'already-complete': 'Nothing to do: every unit is already converted',
  cancelled: 'Conversion cancelled',
};

/**
 * Operator summary printed at the end of a run
 */
export function formatRunReport(report: RunReport): string[] {
  const lines = [
    `${STATUS_HEADLINES[report.status]}: ${report.completed}/${report.totalUnits} units in ${formatElapsedTime(0, report.durationMs)}`,
    `Output: ${report.outputDir}`,
  ];

  if (report.workerCount > 0) {
    const probe =
      report.probe === 'failed'
        ? `safety probe failed: ${report.probeFailure ?? 'unknown reason'}`
        : `safety probe ${report.probe}`;
    lines.push(`Workers: ${report.workerCount} (${probe}), ${report.workersFailed} failed`);
  }
  if (report.failedIndices.length > 0) {
    lines.push(`Failed units (${report.failedIndices.length}): ${formatIndexList(report.failedIndices)}`);
  }
  if (report.missingIndices.length > 0) {
    lines.push(`Missing units (${report.missingIndices.length}): ${formatIndexList(report.missingIndices)}`);
  }
  if (report.status === 'incomplete' || report.status === 'cancelled') {
    lines.push('Run again with the same output directory to retry failed and missing units.');
  }
  return lines;
}
