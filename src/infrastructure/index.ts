export { loadConfig, ConfigError, STORE_DRIVERS, DEFAULT_DATABASE_URL } from './config.js';
export type { AppConfig, StoreDriver } from './config.js';
export { default as storePlugin } from './store-plugin.js';
export type { StorePluginOptions } from './store-plugin.js';
export { InMemoryEventStore } from './memory/index.js';
export { createDbClient, ensureSchema, createPostgresEventStore } from './db/index.js';
export type { Database } from './db/index.js';
