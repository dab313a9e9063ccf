// Console Checkpoint Prompt
// Asks the operator to clear a worker's verification pause, one worker at a time

import { createInterface } from 'node:readline/promises';
import PQueue from 'p-queue';
import type { CheckpointRequest } from '@/state/types';
import type { ICheckpointHandler, ILogger } from './interfaces';
import { cancelledError } from '@/errors';

export interface ConsoleCheckpointPromptOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  logger?: ILogger;
}

export function formatCheckpointPrompt(request: CheckpointRequest): string {
  const { workerId, reason, budget, completedUnits, assignedUnits } = request;
  const progress = `${completedUnits}/${assignedUnits} units done`;
  const headline =
    reason === 'hard-limit'
      ? `Worker #${workerId}: the remote refused further requests after ${budget.requestsSinceCheckpoint} requests, ${progress}.`
      : `Worker #${workerId}: ${budget.requestsSinceCheckpoint} requests since the last checkpoint (threshold ${budget.checkpointThreshold}), ${progress}.`;
  return `[checkpoint] ${headline}\nComplete the verification in this worker's session, then press Enter to resume.\n`;
}

/**
 * Terminal implementation of the checkpoint handler. Prompts are queued so
 * only one worker talks to the operator at a time; aborting a worker drops
 * its prompt, whether queued or on screen.
 */
export class ConsoleCheckpointPrompt implements ICheckpointHandler {
  private readonly queue = new PQueue({ concurrency: 1 });
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(private readonly options: ConsoleCheckpointPromptOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  get pending(): number {
    return this.queue.size + this.queue.pending;
  }

  async awaitCheckpoint(request: CheckpointRequest, signal: AbortSignal): Promise<void> {
    const cancelled = () => cancelledError(`Checkpoint for worker #${request.workerId} cancelled`);
    if (signal.aborted) throw cancelled();

    // p-queue only looks at a task's signal when the task starts, so a queued wait races the abort itself
    let onAbort = (): void => {};
    const aborted = new Promise<never>((_resolve, reject) => {
      onAbort = () => reject(cancelled());
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      await Promise.race([this.queue.add(() => this.ask(request, signal)), aborted]);
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async ask(request: CheckpointRequest, signal: AbortSignal): Promise<void> {
    // Dropped while queued
    if (signal.aborted) return;

    const rl = createInterface({ input: this.input, output: this.output });
    try {
      await rl.question(formatCheckpointPrompt(request), { signal });
    } catch (error: unknown) {
      // The waiting worker has already been rejected
      if (signal.aborted) return;
      throw error;
    } finally {
      rl.close();
    }
    this.options.logger?.info(`Worker #${request.workerId} checkpoint confirmed by operator`);
  }
}
