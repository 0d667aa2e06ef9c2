export { loadGatewayConfig, maskDatabaseUrl } from './config/index.js';
export type { GatewayConfig, LoadedConfig, MetricStoreKind, SourceEndpoint } from './config/index.js';
export { createSourceClients, HttpSourceClient, flattenStatsPayload } from './sources/index.js';
export { dbPlugin, createDbClient, PostgresMetricStore, appendMetrics, ensureMetricsTable, telephonyMetrics } from './db/index.js';
export type { Database } from './db/index.js';
export { InMemoryMetricStore } from './store/index.js';
export { collectorPlugin } from './collector/index.js';
export type { Collector, CollectorPluginOptions } from './collector/index.js';
