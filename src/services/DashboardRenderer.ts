// Dashboard Renderer
// Formats a progress snapshot as terminal lines and redraws them in place

import { clearScreenDown, moveCursor } from 'node:readline';
import type { ProgressSnapshot } from '@/stores/ProgressStore';
import type { WorkerProgress } from '@/state/types';
import { formatElapsedTime } from './Logger';

export interface DashboardOptions {
  title?: string;
  barWidth?: number;
  /** Recent warnings and errors shown under the table */
  alerts?: readonly string[];
}

const DEFAULT_BAR_WIDTH = 20;

/**
 * Human-readable remaining time
 */
export function formatEta(etaMs: number | null): string {
  if (etaMs === 0) return 'Complete!';
  if (etaMs === null) return 'Calculating...';

  const seconds = Math.ceil(etaMs / 1000);
  if (seconds < 60) return `${seconds} sec`;
  if (seconds < 3600) return `${Math.ceil(seconds / 60)} min`;

  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours} hr ${minutes} min`;
}

export function progressBar(done: number, total: number, width: number = DEFAULT_BAR_WIDTH): string {
  const filled = total === 0 ? 0 : Math.min(width, Math.round((done / total) * width));
  return `[${'#'.repeat(filled)}${'-'.repeat(width - filled)}]`;
}

function formatWorkerRow(worker: WorkerProgress, barWidth: number): string {
  const label = `Worker #${worker.workerId}`.padEnd(11);
  const count = `${worker.completed.size}/${worker.assigned.length}`.padEnd(9);
  const state = worker.state.padEnd(20);
  const current = worker.currentIndex !== null ? ` unit ${worker.currentIndex}` : '';
  const failed = worker.failed.size > 0 ? ` (${worker.failed.size} failed)` : '';
  return `${label}${progressBar(worker.completed.size, worker.assigned.length, barWidth)} ${count}${state}${current}${failed}`.trimEnd();
}

/**
 * Header, totals, one row per worker, then the checkpoint queue and recent alerts
 */
export function renderDashboard(snapshot: ProgressSnapshot, now: number, options: DashboardOptions = {}): string[] {
  const { title = 'Parallel conversion', barWidth = DEFAULT_BAR_WIDTH, alerts = [] } = options;
  const { totals } = snapshot;
  const elapsed = snapshot.startedAt !== null ? formatElapsedTime(snapshot.startedAt, now) : '00:00:00';

  const lines = [
    `=== ${title}: ${snapshot.workers.length} workers ===`,
    `Progress: ${totals.completed}/${totals.total} (${totals.percent}%) | Failed: ${totals.failed} | Elapsed: ${elapsed} | ETA: ${formatEta(snapshot.etaMs)}`,
    ...snapshot.workers.map((w) => formatWorkerRow(w, barWidth)),
  ];

  if (snapshot.awaitingCheckpoint.length > 0) {
    lines.push(`Awaiting checkpoint: ${snapshot.awaitingCheckpoint.map((id) => `Worker #${id}`).join(', ')}`);
  }

  if (alerts.length > 0) {
    lines.push('Recent:', ...alerts.map((a) => `  ${a}`));
  }

  return lines;
}

export type DashboardStream = NodeJS.WritableStream & { isTTY?: boolean };

/**
 * Writes dashboard frames to a stream. On a TTY each frame replaces the previous one.
 */
export class DashboardWriter {
  private previousLineCount = 0;

  constructor(private readonly stream: DashboardStream = process.stdout) {}

  write(lines: readonly string[]): void {
    if (this.stream.isTTY && this.previousLineCount > 0) {
      moveCursor(this.stream, 0, -this.previousLineCount);
      clearScreenDown(this.stream);
    }
    this.stream.write(`${lines.join('\n')}\n`);
    this.previousLineCount = lines.length;
  }

  /**
   * Leaves the last frame on screen; the next frame is drawn below whatever
   * was printed after it
   */
  release(): void {
    this.previousLineCount = 0;
  }
}
