import type { Logger } from 'pino';

/**
 * The logging surface application components need.
 *
 * Both a standalone pino logger and `fastify.log` satisfy it.
 */
export type CollectorLogger = Pick<Logger, 'debug' | 'info' | 'warn' | 'error'>;
