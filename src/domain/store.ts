import type {
  CounterFilter,
  ImageCounter,
  Pagination,
  PullEvent,
  PullEventFilter,
  StoredPullEvent,
} from './pull-event.js';

/**
 * Durable, append-only record of pull events and their per-image counters.
 *
 * One instance is created at startup, shared by every request, and closed
 * on shutdown. Implementations must keep each counter equal to the
 * aggregate of its events at every committed point.
 */
export interface PullEventStore {
  /**
   * Creates the schema if absent. Idempotent and non-destructive.
   * Rejects with `InitError`.
   */
  initialize(): Promise<void>;

  /** Whether the schema is present. May probe the storage medium. */
  isInitialized(): Promise<boolean>;

  /**
   * Appends the event and updates its counter atomically.
   * Rejects with `WriteError` or `StoreNotInitializedError`.
   */
  recordEvent(event: PullEvent): Promise<void>;

  /** Counters ordered by image. Rejects with `ReadError` or `StoreNotInitializedError`. */
  queryCounters(filter?: CounterFilter): Promise<ImageCounter[]>;

  /** Events, newest first. Rejects with `ReadError` or `StoreNotInitializedError`. */
  listEvents(filter: PullEventFilter, pagination: Pagination): Promise<StoredPullEvent[]>;

  findEvent(eventId: string): Promise<StoredPullEvent | undefined>;

  /** Cheap round-trip to the storage medium. Never rejects. */
  healthCheck(): Promise<boolean>;

  close(): Promise<void>;
}
