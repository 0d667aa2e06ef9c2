import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

/**
 * GET /health: liveness plus scheduler and collection bookkeeping.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const { scheduler, orchestrator } = fastify.collector;
    const state = orchestrator.state.get();

    return reply.status(200).send({
      status: 'healthy',
      service: 'metrics-gateway',
      timestamp: new Date().toISOString(),
      scheduler: scheduler.getState(),
      polling_enabled: scheduler.enabled,
      polling_interval_seconds: scheduler.intervalMs / 1000,
      last_collection: state.lastRunAt,
      last_successful_collection: state.lastSuccessAt,
      total_metrics_collected: state.totalSaved,
      collection_runs: state.runs,
    });
  });
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['collector'],
  fastify: '5.x',
});
