import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { toCollectionReport } from '../../application/index.js';
import type { CollectionStatus } from '../../application/index.js';

const STATUS_CODES: Record<CollectionStatus, number> = {
  ok: 200,
  degraded: 207,
  outage: 502,
};

/**
 * Manual collection trigger.
 *
 * GET  /api/collect     run one cycle now and return its outcome
 * POST /api/v1/collect  same
 *
 * 200 when clean, 207 when some sources or the store write failed but the
 * cycle still produced data, 502 when nothing could be fetched or saved.
 * The body always carries the full outcome, including partial counts.
 */
async function collectionRoutes(fastify: FastifyInstance): Promise<void> {
  const handler = async (_request: FastifyRequest, reply: FastifyReply) => {
    const outcome = await fastify.collector.scheduler.trigger();
    const report = toCollectionReport(outcome);

    if (report.status !== 'ok') {
      fastify.log.warn({ status: report.status, errors: report.errors }, 'Manual collection completed with errors');
    }

    return reply.status(STATUS_CODES[report.status]).send(report);
  };

  fastify.get('/api/collect', handler);
  fastify.post('/api/v1/collect', handler);
}

export default fp(collectionRoutes, {
  name: 'collection-routes',
  dependencies: ['collector'],
  fastify: '5.x',
});
