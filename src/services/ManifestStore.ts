// Manifest Store
// Durable record of completed / failed unit indices for one output directory

import { mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import PQueue from 'p-queue';
import { z } from 'zod';
import type { Manifest } from '@/state/types';
import type { ILogger } from './Logger';
import { invalidIndexError, manifestCorruptionError } from '@/errors';

export const MANIFEST_FILENAME = 'manifest.json';

const manifestSchema = z.object({
  version: z.literal(1),
  outputDir: z.string(),
  totalUnits: z.number().int().nonnegative(),
  completedIndices: z.array(z.number().int().nonnegative()),
  failedIndices: z.array(z.number().int().nonnegative()),
  updatedAt: z.string(),
});

export interface OpenManifestOptions {
  /** Discard whatever is on disk and start with every unit missing */
  fresh?: boolean;
  /** Indices already produced, used only when no manifest exists yet */
  seedCompleted?: Iterable<number>;
  logger?: ILogger;
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

function sorted(values: Iterable<number>): number[] {
  return [...values].sort((a, b) => a - b);
}

/**
 * Checks the partition invariant on a parsed manifest; returns a reason or null
 */
function findInconsistency(manifest: Manifest): string | null {
  const { totalUnits, completedIndices, failedIndices } = manifest;
  const completed = new Set(completedIndices);
  if (completed.size !== completedIndices.length) return 'duplicate completed indices';
  const failed = new Set(failedIndices);
  if (failed.size !== failedIndices.length) return 'duplicate failed indices';

  for (const index of [...completedIndices, ...failedIndices]) {
    if (index >= totalUnits) return `index ${index} exceeds totalUnits ${totalUnits}`;
  }
  for (const index of failedIndices) {
    if (completed.has(index)) return `index ${index} is both completed and failed`;
  }
  return null;
}

/**
 * Owns the manifest file of one output directory.
 *
 * Workers call markCompleted / markFailed concurrently. State changes apply
 * in memory at once and every write goes through a single-slot queue that
 * persists the merged state (temp file + rename), so no update is lost to
 * another worker's write. Writes queued back to back collapse into one.
 */
export class ManifestStore {
  private readonly queue = new PQueue({ concurrency: 1 });
  private pendingWrite: Promise<void> | null = null;
  private pendingToken: symbol | null = null;

  private constructor(
    readonly outputDir: string,
    readonly totalUnits: number,
    private readonly completed: Set<number>,
    private readonly failed: Set<number>,
    private readonly logger?: ILogger,
  ) {}

  static pathFor(outputDir: string): string {
    return join(outputDir, MANIFEST_FILENAME);
  }

  /**
   * Read and validate the manifest of a directory.
   * Returns null when there is none; throws MANIFEST_CORRUPT when it cannot be trusted.
   */
  static async read(outputDir: string): Promise<Manifest | null> {
    const path = ManifestStore.pathFor(outputDir);

    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error: unknown) {
      if (isNotFound(error)) return null;
      throw manifestCorruptionError(path, 'cannot be read', error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error: unknown) {
      throw manifestCorruptionError(path, 'not valid JSON', error);
    }

    const parsed = manifestSchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw manifestCorruptionError(path, `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }

    const inconsistency = findInconsistency(parsed.data);
    if (inconsistency) {
      throw manifestCorruptionError(path, inconsistency);
    }
    return parsed.data;
  }

  /**
   * Load the manifest for a run, or create it. The file exists on disk when this resolves.
   */
  static async open(outputDir: string, totalUnits: number, options: OpenManifestOptions = {}): Promise<ManifestStore> {
    const { fresh = false, seedCompleted = [], logger } = options;
    await mkdir(outputDir, { recursive: true });

    const existing = fresh ? null : await ManifestStore.read(outputDir);
    let store: ManifestStore;

    if (existing) {
      if (existing.totalUnits !== totalUnits) {
        throw manifestCorruptionError(
          ManifestStore.pathFor(outputDir),
          `records ${existing.totalUnits} units but the run has ${totalUnits}`,
        );
      }
      store = new ManifestStore(
        outputDir,
        totalUnits,
        new Set(existing.completedIndices),
        new Set(existing.failedIndices),
        logger,
      );
      logger?.info(`Loaded manifest: ${existing.completedIndices.length}/${totalUnits} completed`);
    } else {
      const seeded = new Set<number>();
      if (!fresh) {
        for (const index of seedCompleted) {
          if (index >= 0 && index < totalUnits) seeded.add(index);
        }
      }
      store = new ManifestStore(outputDir, totalUnits, seeded, new Set(), logger);
      logger?.info(`Created manifest for ${totalUnits} units`, { seededCompleted: seeded.size });
    }

    await store.scheduleWrite();
    return store;
  }

  private assertIndex(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.totalUnits) {
      throw invalidIndexError(index, this.totalUnits);
    }
  }

  /**
   * Record a finished unit. A unit that failed in an earlier run moves to completed.
   */
  markCompleted(index: number): Promise<void> {
    this.assertIndex(index);
    this.failed.delete(index);
    this.completed.add(index);
    return this.scheduleWrite();
  }

  /**
   * Record a permanent failure. Completed units stay completed.
   */
  markFailed(index: number): Promise<void> {
    this.assertIndex(index);
    if (this.completed.has(index)) {
      this.logger?.debug?.(`Ignoring failure for already completed unit ${index}`);
      return Promise.resolve();
    }
    this.failed.add(index);
    return this.scheduleWrite();
  }

  completedIndices(): number[] {
    return sorted(this.completed);
  }

  failedIndices(): number[] {
    return sorted(this.failed);
  }

  /**
   * Neither completed nor failed
   */
  missingIndices(): number[] {
    const missing: number[] = [];
    for (let i = 0; i < this.totalUnits; i++) {
      if (!this.completed.has(i) && !this.failed.has(i)) missing.push(i);
    }
    return missing;
  }

  snapshot(): Manifest {
    return {
      version: 1,
      outputDir: this.outputDir,
      totalUnits: this.totalUnits,
      completedIndices: this.completedIndices(),
      failedIndices: this.failedIndices(),
      updatedAt: new Date().toISOString(),
    };
  }

  /**
   * Resolves once every scheduled write has reached disk
   */
  async flush(): Promise<void> {
    await this.queue.onIdle();
  }

  private scheduleWrite(): Promise<void> {
    if (this.pendingWrite) return this.pendingWrite;

    // The queue may start the task synchronously inside add()
    const token = Symbol('write');
    this.pendingToken = token;
    const write = this.queue.add(async () => {
      // Cleared before the snapshot: later changes schedule their own write
      if (this.pendingToken === token) {
        this.pendingToken = null;
        this.pendingWrite = null;
      }
      await this.persist();
    });
    if (this.pendingToken === token) {
      this.pendingWrite = write;
    }
    return write;
  }

  private async persist(): Promise<void> {
    const path = ManifestStore.pathFor(this.outputDir);
    const tempPath = `${path}.${process.pid}.tmp`;
    await writeFile(tempPath, `${JSON.stringify(this.snapshot(), null, 2)}\n`, 'utf8');
    await rename(tempPath, path);
  }
}
