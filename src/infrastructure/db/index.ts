export { events } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, SqlClient, DbClientOptions } from './client.js';
export { ensureSchema } from './migrate.js';
export {
  insertEvent,
  findEvents,
  buildFindEventsQuery,
  pingDatabase,
  createPostgresEventStore,
} from './event-repository.js';
