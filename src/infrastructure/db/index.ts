export { pullEvents, imageCounters } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, DbClientOptions, SqlClient } from './client.js';
export {
  bootstrapSchema,
  findMissingColumns,
  schemaExists,
  pingDatabase,
  REQUIRED_COLUMNS,
} from './bootstrap.js';
export { insertPullEvent, queryPullEvents, findPullEventById } from './pull-event-repository.js';
export { queryCounters } from './counter-repository.js';
