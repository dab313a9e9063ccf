// Shared types for the session coordinator

/**
 * One chunk of text and its output slot. Created once, never mutated.
 */
export interface WorkUnit {
  /** 0-based position in the document; defines final ordering */
  readonly index: number;
  /** Containing logical group, e.g. a chapter */
  readonly groupId: string;
  readonly payload: string;
  /** Relative path of the produced audio inside the output directory */
  readonly outputKey: string;
}

/**
 * Chunk as handed over by the chunking stage
 */
export interface ChunkInput {
  index: number;
  groupId: string;
  text: string;
}

export interface WorkerAssignment {
  /** 1-based worker id used in logs and prompts */
  readonly workerId: number;
  readonly units: readonly WorkUnit[];
}

export type WorkerState = 'idle' | 'working' | 'awaiting-checkpoint' | 'done' | 'failed' | 'cancelled';

export const TERMINAL_WORKER_STATES: ReadonlySet<WorkerState> = new Set(['done', 'failed', 'cancelled']);

export interface WorkerProgress {
  workerId: number;
  assigned: readonly number[];
  completed: ReadonlySet<number>;
  failed: ReadonlySet<number>;
  currentIndex: number | null;
  state: WorkerState;
  lastUpdate: number;
  error?: string;
}

export type CheckpointReason = 'threshold' | 'hard-limit';

export interface BudgetSnapshot {
  requestsSinceCheckpoint: number;
  checkpointThreshold: number;
  totalRequests: number;
}

/**
 * Messages a worker sends to whoever supervises it
 */
export type WorkerReport =
  | { type: 'state'; workerId: number; state: WorkerState; at: number }
  | { type: 'unit-started'; workerId: number; index: number; attempt: number; at: number }
  | { type: 'unit-completed'; workerId: number; index: number; at: number }
  | { type: 'unit-failed'; workerId: number; index: number; error: string; at: number }
  | { type: 'checkpoint'; workerId: number; reason: CheckpointReason; budget: BudgetSnapshot; at: number }
  | { type: 'fatal'; workerId: number; error: string; at: number };

/**
 * What the operator sees when a worker needs a verification pause
 */
export interface CheckpointRequest {
  workerId: number;
  reason: CheckpointReason;
  budget: BudgetSnapshot;
  completedUnits: number;
  assignedUnits: number;
}

/**
 * Durable run record. completed, failed and the implied missing set
 * partition 0..totalUnits-1.
 */
export interface Manifest {
  version: 1;
  outputDir: string;
  totalUnits: number;
  completedIndices: number[];
  failedIndices: number[];
  updatedAt: string;
}
