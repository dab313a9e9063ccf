import { PassThrough } from 'node:stream';
import { describe, expect, it } from 'vitest';
import type { ProgressSnapshot } from '@/stores/ProgressStore';
import { DashboardWriter, formatEta, progressBar, renderDashboard } from './DashboardRenderer';

describe('formatEta', () => {
  it.each([
    [0, 'Complete!'],
    [null, 'Calculating...'],
    [45_000, '45 sec'],
    [59_500, '1 min'],
    [90_000, '2 min'],
    [3_600_000, '1 hr 0 min'],
    [5_430_000, '1 hr 30 min'],
  ])('formats %s as %s', (etaMs, expected) => {
    expect(formatEta(etaMs)).toBe(expected);
  });
});

describe('progressBar', () => {
  it('fills proportionally', () => {
    expect(progressBar(1, 4, 8)).toBe('[##------]');
  });

  it('handles an empty assignment', () => {
    expect(progressBar(0, 0, 4)).toBe('[----]');
  });

  it('never overflows', () => {
    expect(progressBar(5, 3, 4)).toBe('[####]');
  });
});

describe('renderDashboard', () => {
  const snapshot: ProgressSnapshot = {
    workers: [
      {
        workerId: 1,
        assigned: [0, 2, 4, 6],
        completed: new Set([0, 2]),
        failed: new Set(),
        currentIndex: 4,
        state: 'working',
        lastUpdate: 60_000,
      },
      {
        workerId: 2,
        assigned: [1, 3, 5, 7],
        completed: new Set([1]),
        failed: new Set([3]),
        currentIndex: null,
        state: 'awaiting-checkpoint',
        lastUpdate: 60_000,
      },
    ],
    totals: { total: 8, completed: 3, failed: 1, pending: 4, percent: 38 },
    awaitingCheckpoint: [2],
    startedAt: 0,
    etaMs: 120_000,
    throughput: 0.05,
  };

  it('renders header, totals, worker rows and the footer', () => {
    const lines = renderDashboard(snapshot, 65_000, {
      barWidth: 10,
      alerts: ['[00:01:00] [WARN] [worker-2] Checkpoint required'],
    });

    expect(lines).toEqual([
      '=== Parallel conversion: 2 workers ===',
      'Progress: 3/8 (38%) | Failed: 1 | Elapsed: 00:01:05 | ETA: 2 min',
      'Worker #1  [#####-----] 2/4      working              unit 4',
      'Worker #2  [###-------] 1/4      awaiting-checkpoint  (1 failed)',
      'Awaiting checkpoint: Worker #2',
      'Recent:',
      '  [00:01:00] [WARN] [worker-2] Checkpoint required',
    ]);
  });

  it('leaves out an empty footer', () => {
    const quiet: ProgressSnapshot = { ...snapshot, awaitingCheckpoint: [] };
    const lines = renderDashboard(quiet, 65_000, { title: 'Safety probe' });

    expect(lines[0]).toBe('=== Safety probe: 2 workers ===');
    expect(lines).toHaveLength(4);
  });
});

describe('DashboardWriter', () => {
  it('appends frames on a plain stream', () => {
    const stream = new PassThrough();
    stream.setEncoding('utf8');
    const writer = new DashboardWriter(stream);

    writer.write(['a', 'b']);
    writer.write(['c']);

    expect(stream.read()).toBe('a\nb\nc\n');
  });

  it('redraws over the previous frame on a TTY', () => {
    const stream = Object.assign(new PassThrough(), { isTTY: true });
    stream.setEncoding('utf8');
    const writer = new DashboardWriter(stream);

    writer.write(['a', 'b']);
    writer.write(['c']);

    expect(stream.read()).toBe('a\nb\n\x1b[2A\x1b[0Jc\n');
  });

  it('draws below a released frame', () => {
    const stream = Object.assign(new PassThrough(), { isTTY: true });
    stream.setEncoding('utf8');
    const writer = new DashboardWriter(stream);

    writer.write(['a', 'b']);
    writer.release();
    stream.write('prompt\n');
    writer.write(['c']);
    writer.write(['d']);

    expect(stream.read()).toBe('a\nb\nprompt\nc\n\x1b[1A\x1b[0Jd\n');
  });
});
