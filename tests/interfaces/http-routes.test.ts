import { describe, it, expect, afterEach } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { collectorPlugin } from '../../src/infrastructure/collector/index.js';
import { InMemoryMetricStore } from '../../src/infrastructure/store/index.js';
import { collectionRoutes, healthRoutes } from '../../src/interfaces/http/index.js';
import type { SourceClient } from '../../src/domain/index.js';
import { fakeSource, makeRecord } from '../helpers.js';

function healthySources(): SourceClient[] {
  return [
    fakeSource('uccx', {
      records: [
        makeRecord({ source: 'uccx', name: 'active_agents', value: 14 }),
        makeRecord({ source: 'uccx', name: 'calls_in_queue', value: 3 }),
      ],
    }).source,
    fakeSource('cucm', {
      records: [makeRecord({ source: 'cucm', name: 'cpu_usage_percent', value: 41.2, unit: 'percent' })],
    }).source,
  ];
}

let current: FastifyInstance | null = null;

async function buildApp(
  sources: SourceClient[],
  polling = { enabled: false, intervalMs: 60_000 },
) {
  const store = new InMemoryMetricStore();
  const instance = Fastify({ logger: false });

  await instance.register(collectorPlugin, { sources, store, polling });
  await instance.register(collectionRoutes);
  await instance.register(healthRoutes);
  await instance.ready();

  current = instance;
  return { app: instance, store };
}

afterEach(async () => {
  await current?.close();
  current = null;
});

describe('GET /api/collect', () => {
  it('returns 200 with per-source counts on a clean run', async () => {
    const { app, store } = await buildApp(healthySources());

    const res = await app.inject({ method: 'GET', url: '/api/collect' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body).toMatchObject({
      status: 'ok',
      success: true,
      source_counts: { uccx: 2, cucm: 1 },
      uccx_metrics_count: 2,
      cucm_metrics_count: 1,
      total_saved: 3,
      dropped_count: 0,
      errors: [],
    });
    expect(typeof body.timestamp).toBe('string');
    expect(store.count()).toBe(3);
  });

  it('returns 207 with partial counts when one source fails', async () => {
    const [uccx] = healthySources();
    const { app } = await buildApp([
      ...(uccx ? [uccx] : []),
      fakeSource('cucm', { error: 'HTTP 500 from http://mock-server:8001/api/cucm/system/stats' }).source,
    ]);

    const res = await app.inject({ method: 'GET', url: '/api/collect' });

    expect(res.statusCode).toBe(207);
    expect(res.json()).toMatchObject({
      status: 'degraded',
      success: false,
      uccx_metrics_count: 2,
      cucm_metrics_count: 0,
      total_saved: 2,
      errors: ['Failed to fetch cucm metrics: HTTP 500 from http://mock-server:8001/api/cucm/system/stats'],
    });
  });

  it('returns 502 when every source fails', async () => {
    const { app } = await buildApp([
      fakeSource('uccx', { error: 'fetch failed' }).source,
      fakeSource('cucm', { error: 'fetch failed' }).source,
    ]);

    const res = await app.inject({ method: 'GET', url: '/api/collect' });

    expect(res.statusCode).toBe(502);
    expect(res.json()).toMatchObject({
      status: 'outage',
      source_counts: { uccx: 0, cucm: 0 },
      total_saved: 0,
      errors: [
        'Failed to fetch uccx metrics: fetch failed',
        'Failed to fetch cucm metrics: fetch failed',
      ],
    });
  });
});

describe('POST /api/v1/collect', () => {
  it('runs a collection cycle', async () => {
    const { app, store } = await buildApp(healthySources());

    const res = await app.inject({ method: 'POST', url: '/api/v1/collect' });

    expect(res.statusCode).toBe(200);
    expect(res.json().total_saved).toBe(3);
    expect(store.count()).toBe(3);
  });
});

describe('GET /health', () => {
  it('reports an idle gateway before any collection', async () => {
    const { app } = await buildApp(healthySources());

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      status: 'healthy',
      service: 'metrics-gateway',
      scheduler: 'stopped',
      polling_enabled: false,
      polling_interval_seconds: 60,
      last_collection: null,
      last_successful_collection: null,
      total_metrics_collected: 0,
      collection_runs: 0,
    });
  });

  it('reflects completed collections', async () => {
    const { app } = await buildApp(healthySources());

    await app.inject({ method: 'GET', url: '/api/collect' });
    await app.inject({ method: 'GET', url: '/api/collect' });
    const body = (await app.inject({ method: 'GET', url: '/health' })).json();

    expect(body.total_metrics_collected).toBe(6);
    expect(body.collection_runs).toBe(2);
    expect(body.last_collection).toBe(body.last_successful_collection);
    expect(typeof body.last_collection).toBe('string');
  });

  it('shows the poll loop running once the server is ready and stopped after close', async () => {
    const { app } = await buildApp(healthySources(), { enabled: true, intervalMs: 60_000 });

    const body = (await app.inject({ method: 'GET', url: '/health' })).json();
    expect(body.scheduler).toBe('running');
    expect(body.polling_enabled).toBe(true);

    await app.close();
    current = null;
    expect(app.collector.scheduler.getState()).toBe('stopped');
  });
});
