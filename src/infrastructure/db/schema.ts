import { pgTable, uuid, varchar, text, integer, bigint, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `pull_events` table.
 *
 * Append-only: rows are inserted by the recorder and never updated or
 * deleted. `event_id` is assigned at ingestion time.
 */
export const pullEvents = pgTable('pull_events', {
  event_id: uuid('event_id').primaryKey(),
  image: varchar('image', { length: 255 }).notNull(),
  registry: varchar('registry', { length: 255 }).notNull(),
  outcome: varchar('outcome', { length: 16, enum: ['success', 'failure'] }).notNull(),
  detail: text('detail'),
  pulled_at: timestamp('pulled_at', { withTimezone: true }).notNull(),
  duration_ms: integer('duration_ms'),
  bytes: bigint('bytes', { mode: 'number' }),
  recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_pull_events_image').on(table.image),
  index('idx_pull_events_pulled_at').on(table.pulled_at),
  index('idx_pull_events_recorded_at').on(table.recorded_at),
]);

/**
 * Drizzle schema for the `image_counters` table.
 *
 * One row per image, upserted in the same transaction as each
 * `pull_events` insert. The row lock taken by the upsert serializes
 * concurrent writers of the same image.
 */
export const imageCounters = pgTable('image_counters', {
  image: varchar('image', { length: 255 }).primaryKey(),
  total: integer('total').notNull().default(0),
  success: integer('success').notNull().default(0),
  failure: integer('failure').notNull().default(0),
  last_seen: timestamp('last_seen', { withTimezone: true }).notNull(),
});
