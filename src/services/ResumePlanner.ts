// Resume Planner
// Works out which units still need audio, from the manifest or from files on disk

import PQueue from 'p-queue';
import type { WorkUnit } from '@/state/types';
import type { IAudioSink, ILogger } from './interfaces';
import { ManifestStore } from './ManifestStore';
import { manifestCorruptionError } from '@/errors';

export type ResumeSource = 'fresh' | 'manifest' | 'artifacts';

export interface ResumePlan {
  source: ResumeSource;
  totalUnits: number;
  completed: number[];
  /** Permanent failures of earlier runs; they are retried */
  previouslyFailed: number[];
  /** Units to convert, with their original indices and output keys */
  missing: WorkUnit[];
  alreadyComplete: boolean;
}

const SCAN_CONCURRENCY = 16;

/**
 * missing = all units minus completed ones
 */
export function computeResumePlan(
  units: readonly WorkUnit[],
  completed: Iterable<number>,
  failed: Iterable<number>,
  source: ResumeSource,
): ResumePlan {
  const done = new Set(completed);
  const missing = units.filter((u) => !done.has(u.index));
  const known = new Set(units.map((u) => u.index));

  return {
    source,
    totalUnits: units.length,
    completed: [...done].filter((i) => known.has(i)).sort((a, b) => a - b),
    previouslyFailed: [...new Set(failed)].filter((i) => known.has(i) && !done.has(i)).sort((a, b) => a - b),
    missing,
    alreadyComplete: missing.length === 0,
  };
}

export class ResumePlanner {
  constructor(
    private readonly deps: {
      sink: IAudioSink;
      logger?: ILogger;
    },
  ) {}

  /**
   * Read-only: planning twice without work in between gives the same plan
   */
  async plan(units: readonly WorkUnit[], outputDir: string, options: { fresh?: boolean } = {}): Promise<ResumePlan> {
    const { logger } = this.deps;

    if (options.fresh) {
      logger?.info(`Fresh run: all ${units.length} units pending`);
      return computeResumePlan(units, [], [], 'fresh');
    }

    const manifest = await ManifestStore.read(outputDir);
    if (manifest) {
      if (manifest.totalUnits !== units.length) {
        throw manifestCorruptionError(
          ManifestStore.pathFor(outputDir),
          `records ${manifest.totalUnits} units but the run has ${units.length}`,
        );
      }
      const plan = computeResumePlan(units, manifest.completedIndices, manifest.failedIndices, 'manifest');
      this.logPlan(plan);
      return plan;
    }

    const plan = computeResumePlan(units, await this.scanArtifacts(units), [], 'artifacts');
    this.logPlan(plan);
    return plan;
  }

  /**
   * Indices whose audio file already exists and is non-empty
   */
  async scanArtifacts(units: readonly WorkUnit[]): Promise<number[]> {
    const queue = new PQueue({ concurrency: SCAN_CONCURRENCY });
    const found = await queue.addAll(units.map((unit) => () => this.deps.sink.exists(unit)));
    return units.filter((_, position) => found[position] === true).map((u) => u.index);
  }

  private logPlan(plan: ResumePlan): void {
    const { logger } = this.deps;
    if (plan.alreadyComplete) {
      logger?.info(`All ${plan.totalUnits} units already converted (${plan.source})`);
      return;
    }
    logger?.info(
      `Resume from ${plan.source}: ${plan.completed.length}/${plan.totalUnits} completed, ${plan.missing.length} missing`,
    );
    if (plan.previouslyFailed.length > 0) {
      logger?.info(`Retrying ${plan.previouslyFailed.length} units that failed before`);
    }
  }
}
