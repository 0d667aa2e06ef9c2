export type { MetricRecord, StoredMetric, CollectionOutcome } from './metric.js';
export { METRIC_FIELD_LIMITS } from './metric.js';
export type { Result } from './result.js';
export { ok, err } from './result.js';
export { FetchError, StoreError, ValidationError } from './errors.js';
export type { SourceClient, MetricStore } from './ports.js';
