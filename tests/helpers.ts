import { vi } from 'vitest';
import type { MetricRecord, Result, SourceClient } from '../src/domain/index.js';
import { FetchError, ok, err } from '../src/domain/index.js';
import type { CollectorLogger } from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies CollectorLogger;
}

let counter = 0;

/**
 * Factory for metric records with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeRecord(overrides: Partial<MetricRecord> = {}): MetricRecord {
  counter++;
  return {
    source: overrides.source ?? 'uccx',
    name: overrides.name ?? `metric_${counter}`,
    value: overrides.value ?? counter,
    unit: overrides.unit ?? 'count',
    timestamp: overrides.timestamp,
  };
}

export interface FakeSourceOptions {
  records?: MetricRecord[];
  error?: string;
  delayMs?: number;
}

/**
 * Source client whose `fetch` is a vi.fn resolving to the given records,
 * or to a FetchError when `error` is set.
 */
export function fakeSource(id: string, options: FakeSourceOptions = {}) {
  const fetch = vi.fn(async (): Promise<Result<MetricRecord[], FetchError>> => {
    if (options.delayMs !== undefined) {
      await new Promise((r) => setTimeout(r, options.delayMs));
    }
    if (options.error !== undefined) {
      return err(new FetchError(id, options.error));
    }
    return ok(options.records ?? []);
  });

  const source: SourceClient = { id, fetch };
  return { source, fetch };
}

/** Fixed "now" for deterministic timestamps. */
export const FIXED_NOW = new Date('2026-03-02T09:30:00Z');
