import { asc, eq } from 'drizzle-orm';
import type { Database } from './client.js';
import { imageCounters } from './schema.js';
import type { CounterFilter, ImageCounter } from '../../domain/index.js';

/**
 * Reads per-image counters, ordered by image.
 *
 * A single SELECT under READ COMMITTED sees only committed event
 * transactions, so every returned row matches its events.
 */
export async function queryCounters(
  db: Database,
  filter: CounterFilter = {},
): Promise<ImageCounter[]> {
  const whereClause = filter.image !== undefined
    ? eq(imageCounters.image, filter.image)
    : undefined;

  const rows = await db
    .select()
    .from(imageCounters)
    .where(whereClause)
    .orderBy(asc(imageCounters.image));

  return rows.map((r) => ({
    image: r.image,
    total: r.total,
    success: r.success,
    failure: r.failure,
    last_seen: r.last_seen.toISOString(),
  }));
}
