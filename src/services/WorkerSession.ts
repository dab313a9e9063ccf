// Worker Session
// One isolated remote session working through its assignment in order

import type {
  BudgetSnapshot,
  CheckpointReason,
  WorkerAssignment,
  WorkerReport,
  WorkerState,
  WorkUnit,
} from '@/state/types';
import type { WorkerConfig } from '@/config';
import type { IAudioSink, ICheckpointHandler, IManifestWriter, ILogger, ITTSSession, ITTSSessionFactory } from './interfaces';
import { SessionBudget } from './SessionBudget';
import { withRetry } from '@/utils/retry';
import { delay } from '@/utils/delay';
import {
  cancelledError,
  getErrorMessage,
  isCancellationError,
  isHardLimitError,
  isRetriableError,
  workerFatalError,
} from '@/errors';

export type WorkerOutcome = Extract<WorkerState, 'done' | 'failed' | 'cancelled'>;

export interface WorkerSessionOptions {
  assignment: WorkerAssignment;
  voice: string;
  checkpointThreshold: number;
  worker: WorkerConfig;
  sessionFactory: ITTSSessionFactory;
  sink: IAudioSink;
  manifest: IManifestWriter;
  checkpointHandler: ICheckpointHandler;
  /** Receives every state change and unit event; the only channel to the supervisor */
  report: (report: WorkerReport) => void;
  signal: AbortSignal;
  logger?: ILogger;
  now?: () => number;
}

export interface WorkerResult {
  workerId: number;
  state: WorkerOutcome;
  completed: number[];
  failed: number[];
  /** Assigned units never finished: not attempted, or interrupted by abort/fatal error */
  unattempted: number[];
  budget: BudgetSnapshot;
  error?: string;
}

/**
 * State machine:
 * idle → working ⇄ awaiting-checkpoint → done | failed | cancelled
 *
 * Transient send errors are retried with a fixed backoff; exhausted retries
 * mark the unit failed and the worker moves on. A hard-limit signal or a
 * spent budget suspends the worker until the operator confirms the
 * checkpoint. Anything unexpected fails this worker only.
 */
export class WorkerSession {
  private state: WorkerState = 'idle';
  private readonly budget: SessionBudget;
  private readonly completed: number[] = [];
  private readonly failed: number[] = [];
  private lastSendAt: number | null = null;
  private readonly now: () => number;
  private readonly logger?: ILogger;

  constructor(private readonly options: WorkerSessionOptions) {
    this.budget = new SessionBudget(options.checkpointThreshold);
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  get workerId(): number {
    return this.options.assignment.workerId;
  }

  /**
   * Process the whole assignment. Never rejects: the outcome is in the result.
   */
  async run(): Promise<WorkerResult> {
    const { assignment, sessionFactory, signal } = this.options;
    let session: ITTSSession | null = null;
    let error: string | undefined;

    try {
      this.transition('working');
      this.throwIfAborted();
      this.logger?.info(`Starting with ${assignment.units.length} units`);
      session = await sessionFactory.createSession(this.workerId, signal);

      for (const unit of assignment.units) {
        this.throwIfAborted();
        if (this.budget.shouldCheckpoint()) {
          await this.checkpoint('threshold');
        }
        await this.processUnit(session, unit);
      }

      this.transition('done');
      this.logger?.info(`Finished: ${this.completed.length} completed, ${this.failed.length} failed`);
    } catch (caught: unknown) {
      if (signal.aborted || isCancellationError(caught)) {
        this.transition('cancelled');
        this.logger?.warn('Stopped by run abort');
      } else {
        const fatal = workerFatalError(this.workerId, caught);
        error = fatal.message;
        this.logger?.error('Worker failed', caught instanceof Error ? caught : fatal);
        this.emit({ type: 'fatal', workerId: this.workerId, error: fatal.message, at: this.now() });
        this.transition('failed');
      }
    } finally {
      await this.closeSession(session);
    }

    return this.buildResult(error);
  }

  private async processUnit(session: ITTSSession, unit: WorkUnit): Promise<void> {
    const audio = await this.sendWithRetry(session, unit);

    if (audio === null) {
      await this.options.manifest.markFailed(unit.index);
      this.failed.push(unit.index);
      this.emit({
        type: 'unit-failed',
        workerId: this.workerId,
        index: unit.index,
        error: `gave up after ${this.options.worker.maxAttempts} attempts`,
        at: this.now(),
      });
      return;
    }

    await this.options.sink.write(unit, audio);
    this.budget.recordSuccess();
    await this.options.manifest.markCompleted(unit.index);
    this.completed.push(unit.index);
    this.emit({ type: 'unit-completed', workerId: this.workerId, index: unit.index, at: this.now() });
  }

  /**
   * Audio bytes, or null once transient retries are exhausted.
   * A hard-limit signal routes through the checkpoint and sends the same unit again.
   */
  private async sendWithRetry(session: ITTSSession, unit: WorkUnit): Promise<Uint8Array | null> {
    const { maxAttempts, retryBackoffMs } = this.options.worker;

    for (;;) {
      try {
        return await withRetry((attempt) => this.sendOnce(session, unit, attempt), {
          maxAttempts,
          baseDelay: retryBackoffMs,
          maxDelay: retryBackoffMs,
          factor: 1,
          randomize: false,
          signal: this.options.signal,
          onRetry: (attempt, error, nextDelay) => {
            this.logger?.warn(
              `Unit ${unit.index} attempt ${attempt}/${maxAttempts} failed: ${getErrorMessage(error)}; retrying in ${nextDelay}ms`,
            );
          },
        });
      } catch (error: unknown) {
        this.throwIfAborted();

        if (isHardLimitError(error)) {
          this.logger?.warn(
            `Hard limit hit on unit ${unit.index} after ${this.budget.getRequestsSinceCheckpoint()} requests since checkpoint`,
          );
          await this.checkpoint('hard-limit');
          continue;
        }

        if (isRetriableError(error)) {
          this.logger?.error(`Unit ${unit.index} failed permanently`, error instanceof Error ? error : undefined);
          return null;
        }

        throw error;
      }
    }
  }

  private async sendOnce(session: ITTSSession, unit: WorkUnit, attempt: number): Promise<Uint8Array> {
    await this.pace();
    this.emit({ type: 'unit-started', workerId: this.workerId, index: unit.index, attempt, at: this.now() });
    this.lastSendAt = this.now();
    return session.send({
      text: unit.payload,
      voice: this.options.voice,
      requestId: `w${this.workerId}-u${unit.index}-a${attempt}`,
      signal: this.options.signal,
    });
  }

  /**
   * Keep at least interRequestDelayMs between two sends of this session
   */
  private async pace(): Promise<void> {
    if (this.lastSendAt === null) return;
    const wait = this.lastSendAt + this.options.worker.interRequestDelayMs - this.now();
    await delay(wait, this.options.signal);
  }

  private async checkpoint(reason: CheckpointReason): Promise<void> {
    this.transition('awaiting-checkpoint');
    const budget = this.budget.snapshot();
    this.emit({ type: 'checkpoint', workerId: this.workerId, reason, budget, at: this.now() });
    this.logger?.warn(`Checkpoint required (${reason}), ${budget.requestsSinceCheckpoint} requests since last one`);

    await this.options.checkpointHandler.awaitCheckpoint(
      {
        workerId: this.workerId,
        reason,
        budget,
        completedUnits: this.completed.length,
        assignedUnits: this.options.assignment.units.length,
      },
      this.options.signal,
    );

    this.budget.recordCheckpointCompleted();
    this.logger?.info('Checkpoint confirmed, resuming');
    this.transition('working');
  }

  private throwIfAborted(): void {
    if (this.options.signal.aborted) throw cancelledError('Worker stopped by run abort');
  }

  private transition(state: WorkerState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit({ type: 'state', workerId: this.workerId, state, at: this.now() });
  }

  private emit(report: WorkerReport): void {
    this.options.report(report);
  }

  private async closeSession(session: ITTSSession | null): Promise<void> {
    if (!session?.close) return;
    try {
      await session.close();
    } catch (error: unknown) {
      this.logger?.warn(`Session close failed: ${getErrorMessage(error)}`);
    }
  }

  private buildResult(error?: string): WorkerResult {
    const finished = new Set([...this.completed, ...this.failed]);
    const state: WorkerOutcome =
      this.state === 'done' || this.state === 'failed' || this.state === 'cancelled' ? this.state : 'failed';

    return {
      workerId: this.workerId,
      state,
      completed: [...this.completed],
      failed: [...this.failed],
      unattempted: this.options.assignment.units.map((u) => u.index).filter((i) => !finished.has(i)),
      budget: this.budget.snapshot(),
      error,
    };
  }
}
