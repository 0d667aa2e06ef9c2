/**
 * Core domain types for collected telemetry.
 *
 * A metric record is one flattened, immutable measurement. Records are
 * appended to the store and never updated.
 */

/**
 * One observed measurement from an upstream source.
 *
 * `timestamp` is optional on the way in; the orchestrator stamps
 * records that arrive without one.
 */
export interface MetricRecord {
  readonly source: string;
  readonly name: string;
  readonly value: number;
  readonly unit: string;
  readonly timestamp?: Date | undefined;
}

/** Longest `source`, `name` and `unit` a store accepts. */
export const METRIC_FIELD_LIMITS = {
  source: 50,
  name: 100,
  unit: 20,
} as const;

/** A record as returned by a store, with its surrogate id. */
export interface StoredMetric extends MetricRecord {
  readonly id: number;
  readonly timestamp: Date;
}

/**
 * Transient summary of one collection cycle. Never persisted.
 *
 * `perSourceCount` is keyed by the configured source id and counts the
 * records accepted from that source (0 when its fetch failed).
 */
export interface CollectionOutcome {
  readonly success: boolean;
  readonly perSourceCount: Readonly<Record<string, number>>;
  readonly totalSaved: number;
  readonly droppedCount: number;
  readonly errors: readonly string[];
  readonly timestamp: string; // ISO-8601
}
