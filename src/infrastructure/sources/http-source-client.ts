import { z } from 'zod';
import type { MetricRecord, Result, SourceClient } from '../../domain/index.js';
import { FetchError, ok, err } from '../../domain/index.js';

/**
 * Zod schema for an upstream stats payload.
 *
 * Only `server_type` and `metrics` are read; anything else in the body
 * (or inside a metric entry) is ignored.
 */
export const statsPayloadSchema = z.object({
  server_type: z.string().optional(),
  metrics: z.record(
    z.string(),
    z.object({
      value: z.number(),
      unit: z.string(),
    }).passthrough(),
  ),
}).passthrough();

export type StatsPayload = z.infer<typeof statsPayloadSchema>;

export interface HttpSourceClientOptions {
  id: string;
  url: string;
  timeoutMs: number;
}

/**
 * Flattens `{ server_type, metrics: { name: { value, unit } } }` into one
 * record per entry, in the payload's key order. `fallbackTag` is used
 * when the payload carries no `server_type`.
 */
export function flattenStatsPayload(payload: StatsPayload, fallbackTag: string): MetricRecord[] {
  const source = payload.server_type ?? fallbackTag;

  return Object.entries(payload.metrics).map(([name, metric]) => ({
    source,
    name,
    value: metric.value,
    unit: metric.unit,
  }));
}

/**
 * Source client for one upstream stats endpoint.
 *
 * One GET per `fetch()`, bounded by `timeoutMs`. Network errors, timeouts,
 * non-2xx responses and malformed bodies all come back as a FetchError.
 * No retries.
 */
export class HttpSourceClient implements SourceClient {
  readonly id: string;
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: HttpSourceClientOptions) {
    this.id = options.id;
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
  }

  async fetch(): Promise<Result<MetricRecord[], FetchError>> {
    let body: unknown;

    try {
      const response = await fetch(this.url, {
        method: 'GET',
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      if (!response.ok) {
        // Release the connection back to the pool
        await response.body?.cancel();
        return err(new FetchError(this.id, `HTTP ${response.status} from ${this.url}`));
      }

      body = await response.json();
    } catch (cause: unknown) {
      return err(new FetchError(this.id, cause));
    }

    const parsed = statsPayloadSchema.safeParse(body);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ');
      return err(new FetchError(this.id, `malformed payload (${detail})`));
    }

    return ok(flattenStatsPayload(parsed.data, this.id));
  }
}
