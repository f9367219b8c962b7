import type { SqlClient } from './client.js';

/** Key for the advisory lock that serializes schema bootstrap across processes. */
const BOOTSTRAP_LOCK = 'pull_metrics_schema';

/**
 * DDL applied by `bootstrapSchema`, in order.
 *
 * Every statement is a no-op against an existing schema, so running the
 * list again never touches stored rows.
 */
const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS pull_events (
     event_id     UUID         PRIMARY KEY,
     image        VARCHAR(255) NOT NULL,
     registry     VARCHAR(255) NOT NULL,
     outcome      VARCHAR(16)  NOT NULL CHECK (outcome IN ('success', 'failure')),
     detail       TEXT,
     pulled_at    TIMESTAMPTZ  NOT NULL,
     duration_ms  INTEGER      CHECK (duration_ms >= 0),
     bytes        BIGINT       CHECK (bytes >= 0),
     recorded_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
   )`,
  `CREATE TABLE IF NOT EXISTS image_counters (
     image      VARCHAR(255) PRIMARY KEY,
     total      INTEGER      NOT NULL DEFAULT 0 CHECK (total >= 0),
     success    INTEGER      NOT NULL DEFAULT 0 CHECK (success >= 0),
     failure    INTEGER      NOT NULL DEFAULT 0 CHECK (failure >= 0),
     last_seen  TIMESTAMPTZ  NOT NULL
   )`,
  `CREATE INDEX IF NOT EXISTS idx_pull_events_image ON pull_events (image)`,
  `CREATE INDEX IF NOT EXISTS idx_pull_events_pulled_at ON pull_events (pulled_at)`,
  `CREATE INDEX IF NOT EXISTS idx_pull_events_recorded_at ON pull_events (recorded_at)`,
  // Counters for events written before image_counters existed.
  `INSERT INTO image_counters (image, total, success, failure, last_seen)
   SELECT image,
          COUNT(*),
          COUNT(*) FILTER (WHERE outcome = 'success'),
          COUNT(*) FILTER (WHERE outcome = 'failure'),
          MAX(pulled_at)
     FROM pull_events
    GROUP BY image
   ON CONFLICT (image) DO NOTHING`,
];

/** Columns the application reads and writes, per table. */
export const REQUIRED_COLUMNS: Readonly<Record<string, readonly string[]>> = {
  pull_events: [
    'event_id',
    'image',
    'registry',
    'outcome',
    'detail',
    'pulled_at',
    'duration_ms',
    'bytes',
    'recorded_at',
  ],
  image_counters: ['image', 'total', 'success', 'failure', 'last_seen'],
};

/**
 * Creates tables and indexes if absent, inside one transaction holding
 * a transaction-scoped advisory lock.
 */
export async function bootstrapSchema(sql: SqlClient): Promise<void> {
  await sql.begin(async (tx) => {
    await tx`SELECT pg_advisory_xact_lock(hashtext(${BOOTSTRAP_LOCK}))`;
    for (const statement of SCHEMA_STATEMENTS) {
      await tx.unsafe(statement);
    }
  });
}

/**
 * Lists `table.column` names the application needs but the database
 * lacks. Empty when the schema is intact.
 */
export async function findMissingColumns(sql: SqlClient): Promise<string[]> {
  const tables = Object.keys(REQUIRED_COLUMNS);
  const rows = await sql<{ table_name: string; column_name: string }[]>`
    SELECT table_name, column_name
      FROM information_schema.columns
     WHERE table_schema = current_schema()
       AND table_name IN ${sql(tables)}
  `;

  const present = new Set(rows.map((r) => `${r.table_name}.${r.column_name}`));
  const missing: string[] = [];
  for (const [table, columns] of Object.entries(REQUIRED_COLUMNS)) {
    for (const column of columns) {
      const key = `${table}.${column}`;
      if (!present.has(key)) missing.push(key);
    }
  }
  return missing;
}

/** True when both tables exist in the current search path. */
export async function schemaExists(sql: SqlClient): Promise<boolean> {
  const rows = await sql<{ ready: boolean }[]>`
    SELECT to_regclass('pull_events') IS NOT NULL
       AND to_regclass('image_counters') IS NOT NULL AS ready
  `;
  return rows[0]?.ready === true;
}

/** Trivial round-trip used by health checks. */
export async function pingDatabase(sql: SqlClient): Promise<void> {
  await sql`SELECT 1`;
}
