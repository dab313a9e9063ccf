// File Audio Sink
// Stores each unit's audio at <outputDir>/<outputKey>

import { mkdir, rename, stat, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import type { WorkUnit } from '@/state/types';
import type { IAudioSink } from './interfaces';

export class FileAudioSink implements IAudioSink {
  constructor(readonly outputDir: string) {}

  pathFor(unit: WorkUnit): string {
    return join(this.outputDir, unit.outputKey);
  }

  /**
   * Written to a temp file first, so an interrupted write never leaves a file that looks finished
   */
  async write(unit: WorkUnit, audio: Uint8Array): Promise<void> {
    const path = this.pathFor(unit);
    await mkdir(dirname(path), { recursive: true });
    const tempPath = `${path}.tmp`;
    await writeFile(tempPath, audio);
    await rename(tempPath, path);
  }

  /**
   * A non-empty file at the unit's output key
   */
  async exists(unit: WorkUnit): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(unit));
      return info.isFile() && info.size > 0;
    } catch (error: unknown) {
      if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}
