import type { CollectionOutcome } from '../domain/index.js';

export interface CollectionStateSnapshot {
  readonly lastRunAt: string | null;
  readonly lastSuccessAt: string | null;
  readonly totalSaved: number;
  readonly runs: number;
}

/**
 * Process-lifetime bookkeeping for the orchestrator.
 *
 * Every update happens inside one synchronous `record()` call, so the
 * scheduled loop and manual triggers can never observe a half-applied
 * outcome. Readers see either the state before or after a run.
 * Reset on restart; never persisted.
 */
export class CollectionState {
  private snapshot: CollectionStateSnapshot = {
    lastRunAt: null,
    lastSuccessAt: null,
    totalSaved: 0,
    runs: 0,
  };

  /** Returns the current snapshot. */
  get(): CollectionStateSnapshot {
    return this.snapshot;
  }

  /** Folds a finished run into the counters. */
  record(outcome: CollectionOutcome): void {
    const prev = this.snapshot;
    this.snapshot = {
      lastRunAt: outcome.timestamp,
      lastSuccessAt: outcome.success ? outcome.timestamp : prev.lastSuccessAt,
      totalSaved: prev.totalSaved + outcome.totalSaved,
      runs: prev.runs + 1,
    };
  }
}
