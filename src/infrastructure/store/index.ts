import type { Logger } from 'pino';
import { createDbClient } from '../db/index.js';
import type { PullEventStore } from '../../domain/index.js';
import type { AppConfig } from '../config.js';
import { InMemoryPullEventStore } from './in-memory-store.js';
import { PostgresPullEventStore } from './postgres-store.js';

export { InMemoryPullEventStore } from './in-memory-store.js';
export { PostgresPullEventStore } from './postgres-store.js';
export { default as storePlugin } from './store-plugin.js';
export type { StorePluginOptions } from './store-plugin.js';

/**
 * Builds the store selected by `DATABASE_URL`.
 *
 * No connection is opened here: postgres.js connects lazily on the
 * first query.
 */
export function createStore(
  config: Pick<AppConfig, 'databaseUrl' | 'databasePoolMax'>,
  log: Logger,
): PullEventStore {
  if (config.databaseUrl.startsWith('memory://')) {
    log.warn('Using in-memory store; pull events are lost on exit');
    return new InMemoryPullEventStore();
  }

  const client = createDbClient(config.databaseUrl, { max: config.databasePoolMax });
  return new PostgresPullEventStore(client, log.child({ component: 'store' }));
}
