import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { MetricStore, SourceClient } from '../../domain/index.js';
import { CollectionOrchestrator, PollingScheduler } from '../../application/index.js';

export interface CollectorPluginOptions {
  sources: readonly SourceClient[];
  store: MetricStore;
  polling: { enabled: boolean; intervalMs: number };
}

export interface Collector {
  orchestrator: CollectionOrchestrator;
  scheduler: PollingScheduler;
}

/**
 * Fastify plugin that wires the collection pipeline.
 *
 * - Decorates `fastify.collector` for the trigger and health routes.
 * - Starts the poll loop once the server is ready.
 * - On preClose, stops the loop and waits for an in-flight cycle, so the
 *   DB pool (closed onClose) is never pulled from under a write.
 */
async function collectorPlugin(
  fastify: FastifyInstance,
  options: CollectorPluginOptions,
): Promise<void> {
  const orchestrator = new CollectionOrchestrator({
    sources: options.sources,
    store: options.store,
    log: fastify.log,
  });

  const scheduler = new PollingScheduler(orchestrator, {
    enabled: options.polling.enabled,
    intervalMs: options.polling.intervalMs,
    log: fastify.log,
  });

  fastify.decorate('collector', { orchestrator, scheduler });

  fastify.addHook('onReady', async () => {
    scheduler.start();
  });

  fastify.addHook('preClose', async () => {
    await scheduler.stop();
  });
}

export default fp(collectorPlugin, {
  name: 'collector',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    collector: Collector;
  }
}
