export { loadGatewayConfig, maskDatabaseUrl, DEFAULT_DATABASE_URL, DEFAULT_MOCK_SERVER_URL } from './gateway-config.js';
export type { GatewayConfig, LoadedConfig, MetricStoreKind, SourceEndpoint } from './gateway-config.js';
