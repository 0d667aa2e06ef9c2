import Fastify from 'fastify';
import type { FastifyError } from 'fastify';
import type { MetricStore } from './domain/index.js';
import {
  loadGatewayConfig,
  maskDatabaseUrl,
  createSourceClients,
  dbPlugin,
  PostgresMetricStore,
  InMemoryMetricStore,
  collectorPlugin,
} from './infrastructure/index.js';
import { collectionRoutes, healthRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap the metrics gateway.
 *
 * Order:
 * 1) Configuration
 * 2) Store (Postgres plugin, or process-local memory)
 * 3) Collector (sources → orchestrator → scheduler)
 * 4) HTTP routes
 * 5) listen(); the poll loop starts on ready
 */
async function main(): Promise<void> {
  const { config, invalid } = loadGatewayConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  if (invalid.length > 0) {
    fastify.log.warn({ variables: invalid }, 'Ignoring invalid environment values, using defaults');
  }

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;

    if (statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled exception');
    }

    return reply.status(statusCode).send({
      error: statusCode >= 500 ? 'Internal server error' : error.name,
      detail: error.message,
      timestamp: new Date().toISOString(),
    });
  });

  // --------------------------------------------------
  // Store
  // --------------------------------------------------

  let store: MetricStore;

  if (config.metricStore === 'memory') {
    fastify.log.warn('Using in-memory metric store; collected data is lost on restart');
    store = new InMemoryMetricStore();
  } else {
    fastify.log.info({ databaseUrl: maskDatabaseUrl(config.databaseUrl) }, 'Connecting to database');
    await fastify.register(dbPlugin, { databaseUrl: config.databaseUrl });
    store = new PostgresMetricStore(fastify.db);
  }

  // --------------------------------------------------
  // Collector
  // --------------------------------------------------

  await fastify.register(collectorPlugin, {
    sources: createSourceClients(config),
    store,
    polling: config.polling,
  });

  fastify.log.info(
    {
      sources: config.sources,
      pollingEnabled: config.polling.enabled,
      intervalMs: config.polling.intervalMs,
      requestTimeoutMs: config.requestTimeoutMs,
    },
    'Collector configured',
  );

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(collectionRoutes);
  await fastify.register(healthRoutes);

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down gateway');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start gateway', err);
  process.exit(1);
});
