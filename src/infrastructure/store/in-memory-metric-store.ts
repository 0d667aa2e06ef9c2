import type { MetricRecord, MetricStore, StoredMetric } from '../../domain/index.js';
import { StoreError } from '../../domain/index.js';
import { metricRecordSchema } from '../../application/metric-schema.js';

/**
 * Process-local, append-only metric store.
 *
 * Used for `METRIC_STORE=memory` and in tests. Mirrors the Postgres
 * store's contract: a batch is checked in full before any row is added,
 * then committed in a single synchronous step, so concurrent batches
 * never interleave and a rejected batch leaves nothing behind.
 */
export class InMemoryMetricStore implements MetricStore {
  private readonly rows: StoredMetric[] = [];
  private nextId = 1;

  async append(records: readonly MetricRecord[]): Promise<number> {
    if (records.length === 0) return 0;

    const now = new Date();
    const staged: StoredMetric[] = [];

    for (const record of records) {
      // Same NOT NULL / finite guarantees the database column types give
      const parsed = metricRecordSchema.safeParse(record);
      if (!parsed.success) {
        throw new StoreError(`row rejected (${parsed.error.issues[0]?.message ?? 'invalid'})`);
      }

      staged.push({
        id: this.nextId + staged.length,
        source: record.source,
        name: record.name,
        value: record.value,
        unit: record.unit,
        timestamp: record.timestamp ?? now,
      });
    }

    this.nextId += staged.length;
    this.rows.push(...staged);
    return staged.length;
  }

  /** All stored rows in insertion order. */
  all(): readonly StoredMetric[] {
    return this.rows;
  }

  count(): number {
    return this.rows.length;
  }
}
