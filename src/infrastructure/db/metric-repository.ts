import type { MetricRecord, MetricStore } from '../../domain/index.js';
import { METRIC_FIELD_LIMITS, StoreError } from '../../domain/index.js';
import type { Database, SqlClient } from './client.js';
import { telephonyMetrics } from './schema.js';
import type { NewTelephonyMetricRow } from './schema.js';

/** Rows per INSERT statement. */
export const INSERT_CHUNK_SIZE = 1000;

/**
 * Creates `telephony_metrics` and its indexes when they are missing.
 * Safe to run on every startup.
 */
export async function ensureMetricsTable(sql: SqlClient): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS telephony_metrics (
      id            SERIAL PRIMARY KEY,
      timestamp     TIMESTAMPTZ      NOT NULL DEFAULT NOW(),
      server_type   VARCHAR(${METRIC_FIELD_LIMITS.source}) NOT NULL,
      metric_name   VARCHAR(${METRIC_FIELD_LIMITS.name}) NOT NULL,
      metric_value  DOUBLE PRECISION NOT NULL,
      unit          VARCHAR(${METRIC_FIELD_LIMITS.unit}) NOT NULL
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_metrics_server_timestamp ON telephony_metrics (server_type, timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_metrics_name_timestamp ON telephony_metrics (metric_name, timestamp)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_metrics_timestamp ON telephony_metrics (timestamp)`);
}

function toRow(record: MetricRecord): NewTelephonyMetricRow {
  return {
    server_type: record.source,
    metric_name: record.name,
    metric_value: record.value,
    unit: record.unit,
    timestamp: record.timestamp,
  };
}

/**
 * Inserts a batch of metrics inside one transaction.
 *
 * BEGIN, chunked INSERTs, COMMIT. Any failure, or a chunk that reports
 * fewer rows than it was given, rolls the whole batch back; Drizzle
 * releases the reserved connection either way.
 *
 * Returns the number of rows committed.
 */
export async function appendMetrics(
  db: Database,
  records: readonly MetricRecord[],
): Promise<number> {
  if (records.length === 0) return 0;

  return db.transaction(async (tx) => {
    let saved = 0;

    for (let start = 0; start < records.length; start += INSERT_CHUNK_SIZE) {
      const chunk = records.slice(start, start + INSERT_CHUNK_SIZE);

      const inserted = await tx
        .insert(telephonyMetrics)
        .values(chunk.map(toRow))
        .returning({ id: telephonyMetrics.id });

      if (inserted.length !== chunk.length) {
        throw new Error(`expected ${chunk.length} rows inserted, got ${inserted.length}`);
      }
      saved += inserted.length;
    }

    return saved;
  });
}

/** MetricStore backed by PostgreSQL through Drizzle. */
export class PostgresMetricStore implements MetricStore {
  private readonly db: Database;

  constructor(db: Database) {
    this.db = db;
  }

  async append(records: readonly MetricRecord[]): Promise<number> {
    try {
      return await appendMetrics(this.db, records);
    } catch (cause: unknown) {
      throw new StoreError(cause);
    }
  }
}
