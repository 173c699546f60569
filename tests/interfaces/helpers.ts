import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app.js';
import type { EventStore } from '../../src/domain/index.js';

/** Fastify instance over the given store, without a logger or a database. */
export function buildTestApp(store: EventStore): Promise<FastifyInstance> {
  return buildApp({
    config: { logLevel: 'silent', storeDriver: 'memory', databaseUrl: '' },
    store,
    logger: false,
  });
}

/** Store whose every operation rejects, as if the database were down. */
export function unreachableStore(): EventStore {
  const down = () => Promise.reject(new Error('connection refused'));
  return {
    driver: 'postgres',
    insertOne: down,
    find: down,
    ping: down,
  };
}
