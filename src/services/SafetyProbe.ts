// Safety Probe
// Short two-worker trial that detects request limits enforced above session level

import type { AppConfig } from '@/config';
import type { WorkerReport, WorkUnit } from '@/state/types';
import type { ILogger } from './interfaces';
import type { ParallelCoordinator, RunSummary } from './ParallelCoordinator';
import { AppError, cancelledError, safetyProbeError } from '@/errors';

export interface SafetyProbeResult {
  passed: boolean;
  /** Set when the probe failed */
  error?: AppError;
  unitsProbed: number;
  /** null when the probe never started */
  summary: RunSummary | null;
}

interface EarlyLimit {
  workerId: number;
  requests: number;
}

/**
 * Runs the first units of the pending list on a few workers before a full
 * parallel run. A hard limit arriving well before the checkpoint threshold
 * means the remote counts requests across sessions, so parallelism would not
 * help. Probe work is real work: audio and manifest entries are kept.
 */
export class SafetyProbe {
  constructor(
    private readonly deps: {
      coordinator: ParallelCoordinator;
      config: AppConfig;
      logger?: ILogger;
    },
  ) {}

  async run(pending: readonly WorkUnit[], signal?: AbortSignal): Promise<SafetyProbeResult> {
    const { coordinator, config, logger } = this.deps;
    const { workers, units: probeSize, minUnits, earlyLimitMargin } = config.safetyProbe;
    const units = pending.slice(0, probeSize);

    if (units.length < minUnits) {
      return this.fail(`Only ${units.length} units pending; the safety probe needs at least ${minUnits}`, 0, null);
    }

    const threshold = config.budget.checkpointThreshold;
    const earlyCutoff = threshold - earlyLimitMargin;
    const controller = new AbortController();
    const forwardAbort = () => controller.abort();
    signal?.addEventListener('abort', forwardAbort, { once: true });
    if (signal?.aborted) controller.abort();

    const detected: { earlyLimit: EarlyLimit | null } = { earlyLimit: null };
    const watch = (report: WorkerReport) => {
      if (detected.earlyLimit || report.type !== 'checkpoint' || report.reason !== 'hard-limit') return;
      if (report.budget.requestsSinceCheckpoint < earlyCutoff) {
        detected.earlyLimit = { workerId: report.workerId, requests: report.budget.requestsSinceCheckpoint };
        logger?.warn(`Early hard limit on worker #${report.workerId}; stopping the probe`);
        controller.abort();
      }
    };

    logger?.info(`Safety probe: ${units.length} units on ${workers} workers`);

    let summary: RunSummary;
    try {
      summary = await coordinator.run(units, {
        workerCount: workers,
        checkpointMode: 'all-at-once',
        signal: controller.signal,
        title: 'Safety probe',
        onReport: watch,
      });
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
    }

    if (signal?.aborted) {
      throw cancelledError('Safety probe cancelled');
    }

    const limit = detected.earlyLimit;
    if (limit !== null) {
      return this.fail(
        `Worker #${limit.workerId} hit the remote limit after ${limit.requests} requests, below the checkpoint threshold of ${threshold}; the limit is enforced above session level`,
        units.length,
        summary,
      );
    }

    if (summary.workersFailed > 0) {
      return this.fail(`${summary.workersFailed} of ${summary.workerCount} probe workers failed`, units.length, summary);
    }

    logger?.info(`Safety probe passed: ${summary.completed.length} units completed`);
    return { passed: true, unitsProbed: units.length, summary };
  }

  private fail(reason: string, unitsProbed: number, summary: RunSummary | null): SafetyProbeResult {
    this.deps.logger?.warn(`Safety probe failed: ${reason}`);
    return { passed: false, error: safetyProbeError(reason), unitsProbed, summary };
  }
}
