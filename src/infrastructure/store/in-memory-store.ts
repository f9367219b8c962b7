import {
  applyEvent,
  toStoredPullEvent,
  StoreNotInitializedError,
  WriteError,
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
 * In-memory pull event store.
 *
 * Selected with `DATABASE_URL=memory://` for local runs, and used by the
 * HTTP tests. Contents are lost on exit.
 *
 * Each write mutates the event log and the counter map synchronously,
 * with no await in between, so concurrent callers can never observe or
 * produce a counter out of step with the log.
 */
export class InMemoryPullEventStore implements PullEventStore {
  private readonly events: StoredPullEvent[] = [];
  private readonly counters: Map<string, ImageCounter> = new Map();
  private initialized = false;
  private closed = false;

  constructor(private readonly now: () => Date = () => new Date()) {}

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async isInitialized(): Promise<boolean> {
    return this.initialized;
  }

  private assertReady(): void {
    if (!this.initialized) {
      throw new StoreNotInitializedError();
    }
  }

  async recordEvent(event: PullEvent): Promise<void> {
    this.assertReady();
    if (this.closed) {
      throw new WriteError(`Store is closed; cannot record pull event for ${event.image}`);
    }
    if (this.events.some((e) => e.event_id === event.event_id)) {
      throw new WriteError(`Duplicate event_id ${event.event_id}`);
    }

    this.events.push(toStoredPullEvent(event, this.now().toISOString()));
    this.counters.set(event.image, applyEvent(this.counters.get(event.image), event));
  }

  async queryCounters(filter: CounterFilter = {}): Promise<ImageCounter[]> {
    this.assertReady();

    if (filter.image !== undefined) {
      const counter = this.counters.get(filter.image);
      return counter === undefined ? [] : [{ ...counter }];
    }

    return [...this.counters.values()]
      .sort((a, b) => (a.image < b.image ? -1 : a.image > b.image ? 1 : 0))
      .map((c) => ({ ...c }));
  }

  async listEvents(filter: PullEventFilter, pagination: Pagination): Promise<StoredPullEvent[]> {
    this.assertReady();

    const matching = this.events.filter((e) =>
      (filter.image === undefined || e.image === filter.image)
      && (filter.outcome === undefined || e.outcome === filter.outcome));

    // Newest first: the log is in recording order.
    return matching
      .reverse()
      .slice(pagination.offset, pagination.offset + pagination.limit);
  }

  async findEvent(eventId: string): Promise<StoredPullEvent | undefined> {
    this.assertReady();
    return this.events.find((e) => e.event_id === eventId);
  }

  async healthCheck(): Promise<boolean> {
    return !this.closed;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
