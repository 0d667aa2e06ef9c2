import type { SourceClient } from '../../domain/index.js';
import type { GatewayConfig } from '../config/index.js';
import { HttpSourceClient } from './http-source-client.js';

export { HttpSourceClient, flattenStatsPayload, statsPayloadSchema } from './http-source-client.js';
export type { HttpSourceClientOptions, StatsPayload } from './http-source-client.js';

/** One HTTP client per configured source endpoint, in configuration order. */
export function createSourceClients(config: GatewayConfig): SourceClient[] {
  return config.sources.map(
    (endpoint) => new HttpSourceClient({
      id: endpoint.id,
      url: endpoint.url,
      timeoutMs: config.requestTimeoutMs,
    }),
  );
}
