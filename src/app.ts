import Fastify from 'fastify';
import type { FastifyInstance, FastifyServerOptions } from 'fastify';
import type { EventStore } from './domain/index.js';
import { storePlugin } from './infrastructure/index.js';
import type { AppConfig } from './infrastructure/index.js';
import { webhookRoutes, feedRoutes, healthRoutes } from './interfaces/http/index.js';

export interface BuildAppOptions {
  config: Pick<AppConfig, 'logLevel' | 'storeDriver' | 'databaseUrl'>;
  /** Overrides the configured driver, e.g. with an in-memory store in tests. */
  store?: EventStore | undefined;
  /** Passed to Fastify as-is; defaults to a pino logger at `config.logLevel`. */
  logger?: FastifyServerOptions['logger'];
}

/**
 * Assembles the Fastify instance without listening.
 *
 * Order:
 * 1) Event store plugin
 * 2) HTTP routes
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? { level: options.config.logLevel },
  });

  await fastify.register(storePlugin, {
    driver: options.config.storeDriver,
    databaseUrl: options.config.databaseUrl,
    store: options.store,
  });

  await fastify.register(webhookRoutes);
  await fastify.register(feedRoutes);
  await fastify.register(healthRoutes);

  return fastify;
}
