import type { WorkerAssignment, WorkUnit } from '@/state/types';
import { invalidConfigError } from '@/errors';

/**
 * Round-robin partition: the unit at list position i goes to worker (i mod n).
 *
 * Scattering adjacent units over all workers means a lost worker leaves thin,
 * evenly interleaved gaps (about 1/n of the total) instead of one contiguous
 * block. Units keep their original index, so the same function serves the
 * full list and a resume's missing list.
 */
export function distributeRoundRobin(units: readonly WorkUnit[], workerCount: number): WorkerAssignment[] {
  if (!Number.isInteger(workerCount) || workerCount <= 0) {
    throw invalidConfigError(`workerCount must be a positive integer, got ${workerCount}`);
  }

  const buckets: WorkUnit[][] = Array.from({ length: workerCount }, () => []);
  units.forEach((unit, position) => {
    buckets[position % workerCount].push(unit);
  });

  return buckets.map((bucket, w) => ({ workerId: w + 1, units: bucket }));
}

/**
 * One line per worker: unit count and the first few indices
 */
export function describeDistribution(assignments: readonly WorkerAssignment[], previewSize = 3): string[] {
  return assignments.map(({ workerId, units }) => {
    const head = units.slice(0, previewSize).map((u) => u.index);
    const preview = units.length > previewSize ? `${head.join(', ')}, ...` : head.join(', ');
    return `Worker #${workerId}: ${units.length} units (starting with: ${preview || 'none'})`;
  });
}
