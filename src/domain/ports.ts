import type { MetricRecord } from './metric.js';
import type { FetchError } from './errors.js';
import type { Result } from './result.js';

/**
 * Fetches and flattens one upstream source.
 *
 * Implementations never throw for expected failures; they return
 * `{ ok: false, error: FetchError }` instead.
 */
export interface SourceClient {
  readonly id: string;
  fetch(): Promise<Result<MetricRecord[], FetchError>>;
}

/**
 * Durable, append-only metric persistence.
 *
 * `append` is all-or-nothing: on failure it throws a StoreError and no
 * record of the batch is visible. An empty batch resolves to 0.
 * The input array is never mutated.
 */
export interface MetricStore {
  append(records: readonly MetricRecord[]): Promise<number>;
}
