import type {
  CollectionOutcome,
  MetricRecord,
  MetricStore,
  Result,
  SourceClient,
} from '../domain/index.js';
import { FetchError, err } from '../domain/index.js';
import type { CollectorLogger } from './logger.js';
import { CollectionState } from './collection-state.js';
import { validateMetricRecord } from './metric-schema.js';

export interface CollectionOrchestratorOptions {
  sources: readonly SourceClient[];
  store: MetricStore;
  log: CollectorLogger;
  state?: CollectionState | undefined;
  /** Clock override for tests. */
  now?: (() => Date) | undefined;
}

/**
 * Runs one collection cycle: fetch every source → validate → persist.
 *
 * Error boundaries:
 * - each source fetch is isolated; a failure only empties that source's
 *   contribution and adds one entry to `errors`
 * - invalid records are dropped individually and counted
 * - a store failure adds one entry to `errors` and leaves `totalSaved` at 0,
 *   but the per-source counts still report what was fetched
 *
 * `runOnce()` never rejects.
 */
export class CollectionOrchestrator {
  private readonly sources: readonly SourceClient[];
  private readonly store: MetricStore;
  private readonly log: CollectorLogger;
  private readonly now: () => Date;
  readonly state: CollectionState;

  constructor(options: CollectionOrchestratorOptions) {
    this.sources = options.sources;
    this.store = options.store;
    this.log = options.log;
    this.state = options.state ?? new CollectionState();
    this.now = options.now ?? (() => new Date());
  }

  async runOnce(): Promise<CollectionOutcome> {
    const errors: string[] = [];
    const perSourceCount: Record<string, number> = {};
    const batch: MetricRecord[] = [];
    let droppedCount = 0;
    let totalSaved = 0;

    try {
      // Every record of the cycle carries the same instant
      const collectedAt = this.now();

      this.log.info({ sources: this.sources.map((s) => s.id) }, 'Starting metrics collection cycle');

      // All fetches settle before the batch is assembled
      const results = await Promise.all(this.sources.map((source) => this.fetchSource(source)));

      results.forEach((result, i) => {
        const source = this.sources[i];
        if (source === undefined) return;

        if (!result.ok) {
          perSourceCount[source.id] = 0;
          errors.push(result.error.message);
          this.log.error({ err: result.error, source: source.id }, result.error.message);
          return;
        }

        let accepted = 0;
        for (const record of result.value) {
          const checked = validateMetricRecord(record);
          if (!checked.ok) {
            droppedCount++;
            this.log.warn(
              { source: source.id, metric: record.name, reason: checked.error.reason },
              'Dropping invalid metric record',
            );
            continue;
          }
          batch.push(record.timestamp === undefined ? { ...record, timestamp: collectedAt } : record);
          accepted++;
        }

        perSourceCount[source.id] = accepted;
        this.log.info({ source: source.id, count: accepted }, `Collected ${accepted} ${source.id} metrics`);
      });

      if (batch.length > 0) {
        try {
          totalSaved = await this.store.append(batch);
          this.log.info({ count: totalSaved }, `Saved ${totalSaved} metrics to database`);
        } catch (storeErr: unknown) {
          const message = storeErr instanceof Error ? storeErr.message : String(storeErr);
          errors.push(message);
          this.log.error({ err: storeErr, batchSize: batch.length }, message);
        }
      }
    } catch (unexpected: unknown) {
      const message = `Unexpected collection failure: ${
        unexpected instanceof Error ? unexpected.message : String(unexpected)
      }`;
      errors.push(message);
      this.log.error({ err: unexpected }, message);
    }

    const outcome: CollectionOutcome = {
      success: errors.length === 0,
      perSourceCount,
      totalSaved,
      droppedCount,
      errors,
      timestamp: this.now().toISOString(),
    };

    this.state.record(outcome);

    if (outcome.success) {
      this.log.info({ totalSaved, droppedCount }, 'Collection cycle complete');
    } else {
      this.log.warn({ errorCount: errors.length, totalSaved }, 'Collection cycle had errors');
    }

    return outcome;
  }

  /** Calls one source; anything it throws becomes a FetchError. */
  private async fetchSource(source: SourceClient): Promise<Result<MetricRecord[], FetchError>> {
    try {
      return await source.fetch();
    } catch (thrown: unknown) {
      return err(thrown instanceof FetchError ? thrown : new FetchError(source.id, thrown));
    }
  }
}
