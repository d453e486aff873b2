import { describe, it, expect } from 'vitest';
import { makeRecord } from '../testing/fixtures.js';
import { PersistenceError } from './persistence-error.js';
import {
  PostgresItemSink,
  buildUpsertStatement,
  dedupeByKey,
} from './postgres-sink.js';
import type { QueryResultLike, SqlClient, SqlPool } from './types.js';

type Statement = { text: string; values: unknown[] | undefined };

/** Records every statement; `failOn` makes matching statements throw. */
class FakePool implements SqlPool {
  readonly statements: Statement[] = [];
  released = 0;
  ended = false;
  rows: unknown[] = [];
  failOn: RegExp | undefined;

  async connect(): Promise<SqlClient> {
    return {
      query: (text, values) => this.query(text, values),
      release: () => {
        this.released += 1;
      },
    };
  }

  async query(text: string, values?: unknown[]): Promise<QueryResultLike> {
    this.statements.push({ text, values });
    if (this.failOn?.test(text)) {
      throw new Error('duplicate key value violates unique constraint');
    }
    return { rows: this.rows, rowCount: this.rows.length };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  texts(): string[] {
    return this.statements.map((statement) => statement.text);
  }
}

describe('buildUpsertStatement', () => {
  it('numbers placeholders across rows and keeps keys out of the update set', () => {
    const { text, values } = buildUpsertStatement('recycle_bin.youtube_scraped_data', [
      makeRecord({ itemId: 'v1' }),
      makeRecord({ itemId: 'v2' }),
    ]);

    expect(values).toHaveLength(56);
    expect(values[0]).toBe('UC-entity-1');
    expect(values[13]).toBe('v1');
    expect(values[41]).toBe('v2');
    expect(text).toContain('($1,$2,$3,');
    expect(text).toContain(',$28,NOW()),($29,');
    expect(text).toContain('ON CONFLICT (channel_id, video_id) DO UPDATE SET');
    expect(text).toContain('likes = EXCLUDED.likes');
    expect(text).toContain('scraped_at = NOW()');
    expect(text).not.toContain('channel_id = EXCLUDED.channel_id');
    expect(text).not.toContain('video_id = EXCLUDED.video_id');
    expect(text).not.toContain('first_scraped_at');
  });
});

describe('dedupeByKey', () => {
  it('keeps the last record for a repeated key', () => {
    const rows = dedupeByKey([
      makeRecord({ itemId: 'v1', likes: 1 }),
      makeRecord({ itemId: 'v2' }),
      makeRecord({ itemId: 'v1', likes: 7 }),
    ]);

    expect(rows.map((row) => [row.itemId, row.likes])).toEqual([
      ['v1', 7],
      ['v2', 1],
    ]);
  });
});

describe('PostgresItemSink', () => {
  it('wraps the upsert in a transaction and releases the client', async () => {
    const pool = new FakePool();
    const sink = new PostgresItemSink(pool);

    const result = await sink.upsert([makeRecord({ itemId: 'v1' })]);

    expect(result).toEqual({ written: 1 });
    const texts = pool.texts();
    expect(texts[0]).toBe('BEGIN');
    expect(texts[1]).toMatch(/^INSERT INTO recycle_bin\.youtube_scraped_data /);
    expect(texts[2]).toBe('COMMIT');
    expect(pool.released).toBe(1);
  });

  it('splits large batches into chunks inside one transaction', async () => {
    const pool = new FakePool();
    const sink = new PostgresItemSink(pool, { insertChunkSize: 2 });

    await sink.upsert(
      ['a', 'b', 'c', 'd', 'e'].map((itemId) => makeRecord({ itemId })),
    );

    const texts = pool.texts();
    expect(texts.filter((text) => text.startsWith('INSERT'))).toHaveLength(3);
    expect(texts[0]).toBe('BEGIN');
    expect(texts[texts.length - 1]).toBe('COMMIT');
  });

  it('issues the same statement for a repeated batch', async () => {
    const pool = new FakePool();
    const sink = new PostgresItemSink(pool);
    const batch = [makeRecord({ itemId: 'v1' }), makeRecord({ itemId: 'v2' })];

    await sink.upsert(batch);
    await sink.upsert(batch);

    const inserts = pool.statements.filter((statement) =>
      statement.text.startsWith('INSERT'),
    );
    expect(inserts).toHaveLength(2);
    expect(inserts[1]).toEqual(inserts[0]);
  });

  it('rolls back and raises PersistenceError on failure', async () => {
    const pool = new FakePool();
    pool.failOn = /^INSERT/;
    const sink = new PostgresItemSink(pool);

    await expect(sink.upsert([makeRecord()])).rejects.toBeInstanceOf(
      PersistenceError,
    );

    expect(pool.texts()).toEqual([
      'BEGIN',
      expect.stringMatching(/^INSERT/),
      'ROLLBACK',
    ]);
    expect(pool.released).toBe(1);
  });

  it('skips the database for an empty batch', async () => {
    const pool = new FakePool();
    const sink = new PostgresItemSink(pool);

    expect(await sink.upsert([])).toEqual({ written: 0 });
    expect(pool.statements).toHaveLength(0);
  });

  it('checks for existing entity rows', async () => {
    const pool = new FakePool();
    const sink = new PostgresItemSink(pool);

    expect(await sink.hasEntity('UC-a')).toBe(false);
    pool.rows = [{ '?column?': 1 }];
    expect(await sink.hasEntity('UC-a')).toBe(true);

    expect(pool.statements[0]).toEqual({
      text: 'SELECT 1 FROM recycle_bin.youtube_scraped_data WHERE channel_id = $1 LIMIT 1',
      values: ['UC-a'],
    });
  });

  it('creates the schema and table with a composite key', async () => {
    const pool = new FakePool();
    const sink = new PostgresItemSink(pool, { schema: 'ingest', table: 'videos' });

    await sink.ensureSchema();

    const texts = pool.texts();
    expect(texts[0]).toBe('CREATE SCHEMA IF NOT EXISTS ingest');
    expect(texts[1]).toMatch(/^CREATE TABLE IF NOT EXISTS ingest\.videos \(/);
    expect(texts[1]).toContain('first_scraped_at TIMESTAMPTZ NOT NULL DEFAULT NOW()');
    expect(texts[1]).toContain('PRIMARY KEY (channel_id, video_id)');
  });

  it('rejects unsafe identifiers', () => {
    expect(
      () => new PostgresItemSink(new FakePool(), { table: 'videos; DROP TABLE x' }),
    ).toThrow('Invalid table name: videos; DROP TABLE x');
  });

  it('ends the pool on close', async () => {
    const pool = new FakePool();
    await new PostgresItemSink(pool).close();

    expect(pool.ended).toBe(true);
  });
});
