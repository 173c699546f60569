import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { BaseLogger } from 'pino';
import * as schema from './schema.js';

export interface DbClientOptions {
  /** Upper bound on pooled connections shared by all requests. */
  poolSize?: number | undefined;
  /** Receives server notices instead of the console. */
  log?: BaseLogger | undefined;
}

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * No connection is opened until the first query. Notices such as
 * "relation already exists, skipping" from the schema bootstrap go to
 * `log` at debug level.
 */
export function createDbClient(databaseUrl: string, options: DbClientOptions = {}) {
  const { log } = options;

  const sql = postgres(databaseUrl, {
    max: options.poolSize ?? 10,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: (notice) => {
      log?.debug({ code: notice['code'], notice: notice['message'] }, 'Postgres notice');
    },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type Database = ReturnType<typeof createDbClient>['db'];
export type SqlClient = ReturnType<typeof createDbClient>['sql'];
