import { z } from 'zod';
import type { MetricRecord } from '../domain/index.js';
import { METRIC_FIELD_LIMITS, ValidationError, ok, err } from '../domain/index.js';
import type { Result } from '../domain/index.js';

/**
 * Zod schema for a record about to be persisted.
 *
 * - `source` and `name` must be non-empty.
 * - `source`, `name` and `unit` must fit their store columns.
 * - `value` must be finite; NaN and ±Infinity are rejected.
 */
export const metricRecordSchema = z.object({
  source: z.string()
    .min(1, 'source must not be empty')
    .max(METRIC_FIELD_LIMITS.source, `source must be at most ${METRIC_FIELD_LIMITS.source} characters`),
  name: z.string()
    .min(1, 'name must not be empty')
    .max(METRIC_FIELD_LIMITS.name, `name must be at most ${METRIC_FIELD_LIMITS.name} characters`),
  value: z.number().finite('value must be finite'),
  unit: z.string()
    .max(METRIC_FIELD_LIMITS.unit, `unit must be at most ${METRIC_FIELD_LIMITS.unit} characters`),
});

/**
 * Validates a single record.
 * Returns the record untouched on success so the caller keeps its identity.
 */
export function validateMetricRecord(
  record: MetricRecord,
): Result<MetricRecord, ValidationError> {
  const parsed = metricRecordSchema.safeParse(record);

  if (parsed.success) return ok(record);

  const reason = parsed.error.issues.map((issue) => issue.message).join('; ');
  return err(new ValidationError(record, reason));
}
