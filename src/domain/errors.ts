import type { MetricRecord } from './metric.js';

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * A source could not be fetched: network failure, timeout,
 * non-success status or malformed payload.
 */
export class FetchError extends Error {
  readonly source: string;

  constructor(source: string, cause: unknown) {
    super(`Failed to fetch ${source} metrics: ${describeCause(cause)}`, { cause });
    this.name = 'FetchError';
    this.source = source;
  }
}

/** A batch could not be persisted. Nothing from the batch was committed. */
export class StoreError extends Error {
  constructor(cause: unknown) {
    super(`Failed to save metrics to database: ${describeCause(cause)}`, { cause });
    this.name = 'StoreError';
  }
}

/** A single record failed validation and was dropped from its batch. */
export class ValidationError extends Error {
  readonly record: MetricRecord;
  readonly reason: string;

  constructor(record: MetricRecord, reason: string) {
    super(`Rejected metric ${record.source || '<empty>'}/${record.name || '<empty>'}: ${reason}`);
    this.name = 'ValidationError';
    this.record = record;
    this.reason = reason;
  }
}
