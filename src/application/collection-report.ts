import type { CollectionOutcome } from '../domain/index.js';

export type CollectionStatus = 'ok' | 'degraded' | 'outage';

export interface CollectionReport {
  status: CollectionStatus;
  success: boolean;
  source_counts: Record<string, number>;
  total_saved: number;
  dropped_count: number;
  errors: string[];
  timestamp: string;
  /** `<source>_metrics_count` for every configured source. */
  [sourceCount: `${string}_metrics_count`]: number;
}

/**
 * - `ok`: no errors
 * - `outage`: errors, nothing fetched from any source and nothing saved
 * - `degraded`: everything in between
 */
export function classifyOutcome(outcome: CollectionOutcome): CollectionStatus {
  if (outcome.success) return 'ok';

  const fetched = Object.values(outcome.perSourceCount).some((n) => n > 0);
  if (!fetched && outcome.totalSaved === 0) return 'outage';

  return 'degraded';
}

/** Wire shape of an outcome, as returned by the trigger endpoint. */
export function toCollectionReport(outcome: CollectionOutcome): CollectionReport {
  const report: CollectionReport = {
    status: classifyOutcome(outcome),
    success: outcome.success,
    source_counts: { ...outcome.perSourceCount },
    total_saved: outcome.totalSaved,
    dropped_count: outcome.droppedCount,
    errors: [...outcome.errors],
    timestamp: outcome.timestamp,
  };

  for (const [source, count] of Object.entries(outcome.perSourceCount)) {
    report[`${source}_metrics_count`] = count;
  }

  return report;
}
