// Work unit construction
// Validates chunker output and assigns deterministic output keys

import { z } from 'zod';
import type { ChunkInput, WorkUnit } from '@/state/types';
import { invalidWorkUnitsError } from '@/errors';

const chunkInputSchema = z.array(
  z.object({
    index: z.number().int().nonnegative(),
    groupId: z.string().min(1),
    text: z.string(),
  }),
);

/**
 * Lowercase alphanumerics and hyphens, safe as a directory name
 */
export function sanitizeGroupName(groupId: string): string {
  const clean = groupId
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, '')
    .replace(/\s+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '');
  return clean || 'group';
}

export function outputKeyFor(index: number, groupId: string): string {
  return `${sanitizeGroupName(groupId)}/chunk_${String(index).padStart(5, '0')}.mp3`;
}

export function createWorkUnit(index: number, groupId: string, payload: string): WorkUnit {
  return Object.freeze({ index, groupId, payload, outputKey: outputKeyFor(index, groupId) });
}

/**
 * Turn chunker output into work units.
 * Accepts 0-based or 1-based indices as long as they are unique and dense;
 * the result is always 0-based and sorted by index.
 */
export function createWorkUnits(chunks: readonly ChunkInput[]): WorkUnit[] {
  const parsed = chunkInputSchema.safeParse(chunks);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw invalidWorkUnitsError(`${issue.path.join('.')}: ${issue.message}`);
  }

  const items = [...parsed.data].sort((a, b) => a.index - b.index);
  if (items.length === 0) {
    throw invalidWorkUnitsError('no chunks to convert');
  }

  const offset = items[0].index;
  if (offset !== 0 && offset !== 1) {
    throw invalidWorkUnitsError(`indices must start at 0 or 1, got ${offset}`);
  }

  items.forEach((item, position) => {
    if (item.index !== position + offset) {
      const reason = item.index === items[position - 1]?.index ? 'duplicate' : 'missing before';
      throw invalidWorkUnitsError(`index ${item.index} is ${reason} (expected ${position + offset})`);
    }
  });

  return items.map((item) => createWorkUnit(item.index - offset, item.groupId, item.text));
}

/**
 * Check that a unit list is dense over 0..N-1 in order
 */
export function assertDenseUnits(units: readonly WorkUnit[]): void {
  units.forEach((unit, position) => {
    if (unit.index !== position) {
      throw invalidWorkUnitsError(`unit at position ${position} has index ${unit.index}`);
    }
  });
}
