import { pgTable, serial, varchar, doublePrecision, timestamp, index } from 'drizzle-orm/pg-core';
import { METRIC_FIELD_LIMITS } from '../../domain/index.js';

/**
 * Drizzle schema for the `telephony_metrics` time-series table.
 *
 * Append-only: rows are inserted by collection cycles and never updated.
 * `timestamp` defaults to insertion time, but the collector normally
 * supplies one shared instant per cycle.
 */
export const telephonyMetrics = pgTable('telephony_metrics', {
  id: serial('id').primaryKey(),
  timestamp: timestamp('timestamp', { withTimezone: true }).notNull().defaultNow(),
  server_type: varchar('server_type', { length: METRIC_FIELD_LIMITS.source }).notNull(),
  metric_name: varchar('metric_name', { length: METRIC_FIELD_LIMITS.name }).notNull(),
  metric_value: doublePrecision('metric_value').notNull(),
  unit: varchar('unit', { length: METRIC_FIELD_LIMITS.unit }).notNull(),
}, (table) => [
  index('idx_metrics_server_timestamp').on(table.server_type, table.timestamp),
  index('idx_metrics_name_timestamp').on(table.metric_name, table.timestamp),
  index('idx_metrics_timestamp').on(table.timestamp),
]);

export type NewTelephonyMetricRow = typeof telephonyMetrics.$inferInsert;
