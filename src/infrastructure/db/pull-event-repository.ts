import { and, desc, eq, sql, type SQL } from 'drizzle-orm';
import type { Database } from './client.js';
import { pullEvents, imageCounters } from './schema.js';
import { outcomeDelta, toStoredPullEvent } from '../../domain/index.js';
import type { PullEvent, PullEventFilter, Pagination, StoredPullEvent } from '../../domain/index.js';

type PullEventRow = typeof pullEvents.$inferSelect;

function toStoredEvent(row: PullEventRow): StoredPullEvent {
  return toStoredPullEvent(
    {
      event_id: row.event_id,
      image: row.image,
      registry: row.registry,
      outcome: row.outcome,
      detail: row.detail,
      timestamp: row.pulled_at.toISOString(),
      duration_ms: row.duration_ms,
      bytes: row.bytes,
    },
    row.recorded_at.toISOString(),
  );
}

/**
 * Appends a pull event and folds it into the image's counter.
 *
 * Both statements run in one transaction. The counter upsert uses
 * ON CONFLICT DO UPDATE with column arithmetic, so concurrent writers
 * of the same image queue on the counter's row lock instead of
 * overwriting each other.
 */
export async function insertPullEvent(db: Database, event: PullEvent): Promise<void> {
  const pulledAt = new Date(event.timestamp);
  const delta = outcomeDelta(event.outcome);

  await db.transaction(async (tx) => {
    await tx.insert(pullEvents).values({
      event_id: event.event_id,
      image: event.image,
      registry: event.registry,
      outcome: event.outcome,
      detail: event.detail,
      pulled_at: pulledAt,
      duration_ms: event.duration_ms,
      bytes: event.bytes,
    });

    await tx
      .insert(imageCounters)
      .values({
        image: event.image,
        total: 1,
        success: delta.success,
        failure: delta.failure,
        last_seen: pulledAt,
      })
      .onConflictDoUpdate({
        target: imageCounters.image,
        set: {
          total: sql`${imageCounters.total} + 1`,
          success: sql`${imageCounters.success} + excluded.success`,
          failure: sql`${imageCounters.failure} + excluded.failure`,
          last_seen: sql`GREATEST(${imageCounters.last_seen}, excluded.last_seen)`,
        },
      });
  });
}

/**
 * Fetches a page of pull events, newest first.
 * Only non-undefined filters are applied.
 */
export async function queryPullEvents(
  db: Database,
  filter: PullEventFilter,
  pagination: Pagination,
): Promise<StoredPullEvent[]> {
  const conditions: SQL[] = [];

  if (filter.image !== undefined) {
    conditions.push(eq(pullEvents.image, filter.image));
  }
  if (filter.outcome !== undefined) {
    conditions.push(eq(pullEvents.outcome, filter.outcome));
  }

  const whereClause = conditions.length > 0 ? and(...conditions) : undefined;

  const rows = await db
    .select()
    .from(pullEvents)
    .where(whereClause)
    .orderBy(desc(pullEvents.recorded_at), desc(pullEvents.pulled_at))
    .limit(pagination.limit)
    .offset(pagination.offset);

  return rows.map(toStoredEvent);
}

/** Fetches one pull event by id. Returns undefined if not found. */
export async function findPullEventById(
  db: Database,
  eventId: string,
): Promise<StoredPullEvent | undefined> {
  const rows = await db
    .select()
    .from(pullEvents)
    .where(eq(pullEvents.event_id, eventId))
    .limit(1);

  const row = rows[0];
  return row === undefined ? undefined : toStoredEvent(row);
}
