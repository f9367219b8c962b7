import { describe, it, expect, vi } from 'vitest';
import {
  bootstrapSchema,
  findMissingColumns,
  REQUIRED_COLUMNS,
} from '../../src/infrastructure/db/bootstrap.js';
import type { SqlClient } from '../../src/infrastructure/db/client.js';

/**
 * Minimal postgres.js stand-in: tagged-template calls resolve to `rows`,
 * `begin` runs its callback against the same function, and `unsafe`
 * records every DDL statement.
 */
function makeFakeSql(rows: unknown[] = []) {
  const statements: string[] = [];
  const tag = Object.assign(
    vi.fn(async (..._args: unknown[]) => rows),
    { unsafe: vi.fn(async (statement: string) => { statements.push(statement); return []; }) },
  );
  const sql = Object.assign(tag, {
    begin: vi.fn(async (fn: (tx: typeof tag) => Promise<unknown>) => fn(tag)),
  });
  return { sql: sql as unknown as SqlClient, statements };
}

// ─── bootstrapSchema ─────────────────────────────────────────

describe('bootstrapSchema', () => {
  it('creates pull_events with every column in one statement', async () => {
    const { sql, statements } = makeFakeSql();

    await bootstrapSchema(sql);

    const create = statements.find((s) => s.includes('CREATE TABLE IF NOT EXISTS pull_events'));
    expect(create).toBeDefined();
    for (const column of REQUIRED_COLUMNS['pull_events'] ?? []) {
      expect(create).toMatch(new RegExp(`\\b${column}\\b`));
    }
  });

  it('never backfills columns with a default through ALTER TABLE', async () => {
    const { sql, statements } = makeFakeSql();

    await bootstrapSchema(sql);

    expect(statements.some((s) => s.includes('ADD COLUMN'))).toBe(false);
  });
});

// ─── findMissingColumns ──────────────────────────────────────

describe('findMissingColumns', () => {
  it('is empty when every column is present', async () => {
    const rows = Object.entries(REQUIRED_COLUMNS).flatMap(([table_name, columns]) =>
      columns.map((column_name) => ({ table_name, column_name })));
    const { sql } = makeFakeSql(rows);

    expect(await findMissingColumns(sql)).toEqual([]);
  });

  it('names the columns the database lacks', async () => {
    const rows = Object.entries(REQUIRED_COLUMNS).flatMap(([table_name, columns]) =>
      columns
        .filter((c) => !(table_name === 'pull_events' && c === 'bytes'))
        .map((column_name) => ({ table_name, column_name })));
    const { sql } = makeFakeSql(rows);

    expect(await findMissingColumns(sql)).toEqual(['pull_events.bytes']);
  });
});
