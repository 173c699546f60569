import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { EventStore } from '../domain/index.js';
import type { StoreDriver } from './config.js';
import { createDbClient, createPostgresEventStore, ensureSchema } from './db/index.js';
import { InMemoryEventStore } from './memory/index.js';

export interface StorePluginOptions {
  driver: StoreDriver;
  databaseUrl: string;
  /** Pre-built store; when given, `driver` and `databaseUrl` are ignored. */
  store?: EventStore | undefined;
}

/**
 * Fastify plugin that owns the EventStore lifecycle.
 *
 * Decorates `fastify.eventStore` for the HTTP routes. For the postgres
 * driver it bootstraps the schema on start and closes the pool on shutdown.
 */
async function storePlugin(fastify: FastifyInstance, opts: StorePluginOptions): Promise<void> {
  if (opts.store !== undefined) {
    fastify.decorate('eventStore', opts.store);
    return;
  }

  if (opts.driver === 'memory') {
    fastify.decorate('eventStore', new InMemoryEventStore());
    fastify.log.warn('Using in-memory event store; events are not persisted');
    return;
  }

  const { sql, db } = createDbClient(opts.databaseUrl, { log: fastify.log });
  await ensureSchema(sql);
  fastify.log.info('Database ready (events table)');

  fastify.decorate('eventStore', createPostgresEventStore(db));

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(storePlugin, {
  name: 'event-store',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.eventStore` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    eventStore: EventStore;
  }
}
