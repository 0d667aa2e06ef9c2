import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import type { Database } from './client.js';
import { ensureMetricsTable } from './metric-repository.js';

export interface DbPluginOptions {
  databaseUrl: string;
}

/**
 * Fastify plugin that owns the Drizzle/postgres.js connection.
 *
 * Ensures the metrics table exists, decorates `fastify.db`, and closes
 * the pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, options: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(options.databaseUrl);

  await ensureMetricsTable(sql);
  fastify.log.info('Database schema ready');

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.db` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
