import type { PullEventFilter, PullEventStore, PullOutcome, StoredPullEvent } from '../domain/index.js';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

export interface ListPullEventsParams {
  limit?: number;
  offset?: number;
  image?: string;
  outcome?: PullOutcome;
}

export interface PullEventPage {
  data: StoredPullEvent[];
  pagination: { limit: number; offset: number; count: number };
}

/**
 * Use case: list pull events with pagination and filters.
 * Clamps limit to [1, 500], defaults to 50.
 */
export async function listPullEvents(
  store: PullEventStore,
  params: ListPullEventsParams,
): Promise<PullEventPage> {
  const limit = Math.min(Math.max(params.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
  const offset = Math.max(params.offset ?? 0, 0);

  const filter: PullEventFilter = {};
  if (params.image !== undefined) filter.image = params.image;
  if (params.outcome !== undefined) filter.outcome = params.outcome;

  const data = await store.listEvents(filter, { limit, offset });

  return {
    data,
    pagination: { limit, offset, count: data.length },
  };
}

/**
 * Use case: fetch a single pull event by ID.
 * Returns null if not found.
 */
export async function getPullEvent(store: PullEventStore, eventId: string): Promise<StoredPullEvent | null> {
  const event = await store.findEvent(eventId);
  return event ?? null;
}
