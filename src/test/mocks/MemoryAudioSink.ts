// In-memory audio sink

import { vi } from 'vitest';
import type { IAudioSink } from '@/services/interfaces';
import type { WorkUnit } from '@/state/types';

export class MemoryAudioSink implements IAudioSink {
  readonly files = new Map<string, Uint8Array>();
  private readonly failing = new Set<number>();

  /**
   * Make writes for this unit throw, as a full disk would
   */
  failWritesFor(index: number): this {
    this.failing.add(index);
    return this;
  }

  write = vi.fn(async (unit: WorkUnit, audio: Uint8Array): Promise<void> => {
    if (this.failing.has(unit.index)) {
      throw Object.assign(new Error(`ENOSPC: no space left on device, write '${unit.outputKey}'`), {
        code: 'ENOSPC',
      });
    }
    this.files.set(unit.outputKey, audio);
  });

  exists = vi.fn(async (unit: WorkUnit): Promise<boolean> => this.files.has(unit.outputKey));
}

export function createMemoryAudioSink(): MemoryAudioSink {
  return new MemoryAudioSink();
}
