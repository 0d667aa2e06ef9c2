export { telephonyMetrics } from './schema.js';
export type { NewTelephonyMetricRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient } from './client.js';
export {
  appendMetrics,
  ensureMetricsTable,
  PostgresMetricStore,
  INSERT_CHUNK_SIZE,
} from './metric-repository.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
