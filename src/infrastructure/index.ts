export { loadAppConfig, redactDatabaseUrl } from './config.js';
export type { AppConfig, LogLevel } from './config.js';
export {
  createStore,
  storePlugin,
  InMemoryPullEventStore,
  PostgresPullEventStore,
} from './store/index.js';
export type { StorePluginOptions } from './store/index.js';
export { createDbClient, pullEvents, imageCounters } from './db/index.js';
export type { Database, DbClient, SqlClient } from './db/index.js';
