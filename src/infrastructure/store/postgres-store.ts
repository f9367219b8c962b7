import type { Logger } from 'pino';
import {
  bootstrapSchema,
  findMissingColumns,
  schemaExists,
  pingDatabase,
  insertPullEvent,
  queryPullEvents,
  findPullEventById,
  queryCounters,
} from '../db/index.js';
import type { DbClient } from '../db/index.js';
import {
  InitError,
  WriteError,
  ReadError,
  StoreNotInitializedError,
} from '../../domain/index.js';
import type {
  CounterFilter,
  ImageCounter,
  Pagination,
  PullEvent,
  PullEventFilter,
  PullEventStore,
  StoredPullEvent,
} from '../../domain/index.js';

/**
 * PostgreSQL-backed pull event store.
 *
 * Wraps the db repository functions and translates driver failures into
 * the domain error taxonomy. Readiness is cached once the schema is known
 * to exist: either after `initialize()` or after a successful probe.
 */
export class PostgresPullEventStore implements PullEventStore {
  private ready = false;
  private initRun: Promise<void> | null = null;
  private closed = false;

  constructor(
    private readonly client: DbClient,
    private readonly log: Logger,
  ) {}

  initialize(): Promise<void> {
    // Concurrent callers share one run; a failed run can be retried.
    this.initRun ??= this.runInitialize().catch((err: unknown) => {
      this.initRun = null;
      throw err;
    });
    return this.initRun;
  }

  private async runInitialize(): Promise<void> {
    if (this.ready) return;

    try {
      await bootstrapSchema(this.client.sql);
    } catch (err: unknown) {
      throw new InitError('Failed to create database schema', { cause: err });
    }

    let missing: string[];
    try {
      missing = await findMissingColumns(this.client.sql);
    } catch (err: unknown) {
      throw new InitError('Failed to verify database schema', { cause: err });
    }

    if (missing.length > 0) {
      throw new InitError(`Database schema is missing columns: ${missing.join(', ')}`);
    }

    this.ready = true;
    this.log.info('Database schema ready (pull_events + image_counters)');
  }

  async isInitialized(): Promise<boolean> {
    if (this.ready) return true;
    this.ready = await schemaExists(this.client.sql);
    return this.ready;
  }

  /**
   * Fails with `StoreNotInitializedError` unless the schema exists.
   * Driver failures during the probe are wrapped by `wrap`.
   */
  private async assertReady(wrap: (err: unknown) => Error): Promise<void> {
    if (this.ready) return;

    let present: boolean;
    try {
      present = await this.isInitialized();
    } catch (err: unknown) {
      throw wrap(err);
    }

    if (!present) {
      throw new StoreNotInitializedError();
    }
  }

  async recordEvent(event: PullEvent): Promise<void> {
    const wrap = (err: unknown) => new WriteError(`Failed to record pull event for ${event.image}`, { cause: err });

    await this.assertReady(wrap);
    try {
      await insertPullEvent(this.client.db, event);
    } catch (err: unknown) {
      throw wrap(err);
    }
  }

  async queryCounters(filter: CounterFilter = {}): Promise<ImageCounter[]> {
    const wrap = (err: unknown) => new ReadError('Failed to query image counters', { cause: err });

    await this.assertReady(wrap);
    try {
      return await queryCounters(this.client.db, filter);
    } catch (err: unknown) {
      throw wrap(err);
    }
  }

  async listEvents(filter: PullEventFilter, pagination: Pagination): Promise<StoredPullEvent[]> {
    const wrap = (err: unknown) => new ReadError('Failed to query pull events', { cause: err });

    await this.assertReady(wrap);
    try {
      return await queryPullEvents(this.client.db, filter, pagination);
    } catch (err: unknown) {
      throw wrap(err);
    }
  }

  async findEvent(eventId: string): Promise<StoredPullEvent | undefined> {
    const wrap = (err: unknown) => new ReadError(`Failed to read pull event ${eventId}`, { cause: err });

    await this.assertReady(wrap);
    try {
      return await findPullEventById(this.client.db, eventId);
    } catch (err: unknown) {
      throw wrap(err);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await pingDatabase(this.client.sql);
      return true;
    } catch (err: unknown) {
      this.log.warn({ err }, 'Database health check failed');
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.client.sql.end();
    this.log.info('Database disconnected');
  }
}
