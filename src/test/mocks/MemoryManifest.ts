// In-memory manifest writer for worker-level tests

import { vi } from 'vitest';
import type { IManifestWriter } from '@/services/interfaces';

export class MemoryManifest implements IManifestWriter {
  readonly completed = new Set<number>();
  readonly failed = new Set<number>();

  markCompleted = vi.fn(async (index: number): Promise<void> => {
    this.failed.delete(index);
    this.completed.add(index);
  });

  markFailed = vi.fn(async (index: number): Promise<void> => {
    if (!this.completed.has(index)) this.failed.add(index);
  });
}

export function createMemoryManifest(): MemoryManifest {
  return new MemoryManifest();
}
