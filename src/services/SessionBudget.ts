import type { BudgetSnapshot } from '@/state/types';
import { invalidConfigError } from '@/errors';

/**
 * Per-session request counter that decides when a verification pause is due.
 *
 * The remote's limit is count-based, so the trigger is a plain count compared
 * against a fixed threshold kept below the observed hard quota.
 */
export class SessionBudget {
  private requestsSinceCheckpoint = 0;
  private totalRequests = 0;

  constructor(private readonly checkpointThreshold: number) {
    if (!Number.isInteger(checkpointThreshold) || checkpointThreshold <= 0) {
      throw invalidConfigError(`checkpointThreshold must be a positive integer, got ${checkpointThreshold}`);
    }
  }

  shouldCheckpoint(): boolean {
    return this.requestsSinceCheckpoint >= this.checkpointThreshold;
  }

  recordSuccess(): void {
    this.requestsSinceCheckpoint++;
    this.totalRequests++;
  }

  /**
   * Operator confirmed the pause. totalRequests keeps counting.
   */
  recordCheckpointCompleted(): void {
    this.requestsSinceCheckpoint = 0;
  }

  getRequestsSinceCheckpoint(): number {
    return this.requestsSinceCheckpoint;
  }

  snapshot(): BudgetSnapshot {
    return {
      requestsSinceCheckpoint: this.requestsSinceCheckpoint,
      checkpointThreshold: this.checkpointThreshold,
      totalRequests: this.totalRequests,
    };
  }
}
