import pg from 'pg';
import { createLogger } from '@workspace/logger';
import { PersistenceError } from './persistence-error.js';
import type {
  ItemRecord,
  ItemSink,
  PostgresSinkConfig,
  SqlPool,
  UpsertResult,
} from './types.js';

const sinkLog = createLogger('postgres-sink');

type ColumnSpec = {
  name: string;
  ddl: string;
  value: (record: ItemRecord) => unknown;
};

const KEY_COLUMNS = ['channel_id', 'video_id'] as const;

const COLUMNS: readonly ColumnSpec[] = [
  { name: 'channel_id', ddl: 'VARCHAR(255) NOT NULL', value: (r) => r.entityId },
  { name: 'channel_handle', ddl: 'VARCHAR(255)', value: (r) => r.entityHandle },
  { name: 'channel_title', ddl: 'TEXT', value: (r) => r.entityTitle },
  { name: 'channel_description', ddl: 'TEXT', value: (r) => r.entityDescription },
  { name: 'subscriber_count', ddl: 'BIGINT', value: (r) => r.subscriberCount },
  { name: 'video_count', ddl: 'BIGINT', value: (r) => r.itemCount },
  { name: 'view_count', ddl: 'BIGINT', value: (r) => r.viewCount },
  { name: 'uploads_playlist_id', ddl: 'VARCHAR(255)', value: (r) => r.childListingId },
  { name: 'country', ddl: 'VARCHAR(10)', value: (r) => r.country },
  { name: 'published_at', ddl: 'TIMESTAMPTZ', value: (r) => r.entityPublishedAt },
  { name: 'topic_categories', ddl: 'TEXT', value: (r) => r.topicCategories },
  { name: 'made_for_kids', ddl: 'BOOLEAN', value: (r) => r.entityMadeForKids },
  { name: 'privacy_status', ddl: 'VARCHAR(50)', value: (r) => r.privacyStatus },
  { name: 'video_id', ddl: 'VARCHAR(255) NOT NULL', value: (r) => r.itemId },
  { name: 'title', ddl: 'TEXT', value: (r) => r.title },
  { name: 'description', ddl: 'TEXT', value: (r) => r.description },
  { name: 'video_published', ddl: 'TIMESTAMPTZ', value: (r) => r.itemPublishedAt },
  { name: 'video_url', ddl: 'TEXT', value: (r) => r.itemUrl },
  { name: 'channel_title_video', ddl: 'TEXT', value: (r) => r.channelTitle },
  { name: 'tags', ddl: 'TEXT', value: (r) => r.tags },
  { name: 'likes', ddl: 'BIGINT', value: (r) => r.likes },
  { name: 'comments', ddl: 'BIGINT', value: (r) => r.comments },
  { name: 'views', ddl: 'BIGINT', value: (r) => r.views },
  { name: 'duration', ddl: 'VARCHAR(50)', value: (r) => r.duration },
  { name: 'definition', ddl: 'VARCHAR(20)', value: (r) => r.definition },
  { name: 'category_id', ddl: 'VARCHAR(10)', value: (r) => r.categoryId },
  { name: 'license', ddl: 'VARCHAR(50)', value: (r) => r.license },
  { name: 'video_made_for_kids', ddl: 'BOOLEAN', value: (r) => r.itemMadeForKids },
];

const COLUMN_LIST = [...COLUMNS.map((column) => column.name), 'scraped_at'].join(', ');

const UPDATE_SET = [
  ...COLUMNS.filter(
    (column) => !KEY_COLUMNS.some((key) => key === column.name),
  ).map((column) => `${column.name} = EXCLUDED.${column.name}`),
  'scraped_at = NOW()',
].join(', ');

const IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

const DEFAULT_CONFIG: PostgresSinkConfig = {
  schema: 'recycle_bin',
  table: 'youtube_scraped_data',
  insertChunkSize: 500,
};

function assertIdentifier(kind: string, value: string): string {
  if (!IDENTIFIER.test(value)) {
    throw new PersistenceError(`Invalid ${kind} name: ${value}`);
  }

  return value;
}

function recordKey(record: ItemRecord): string {
  return `${record.entityId}\u0000${record.itemId}`;
}

/** Last occurrence of a key wins, matching what a sequential replay would store. */
export function dedupeByKey(records: readonly ItemRecord[]): ItemRecord[] {
  const seen = new Map<string, ItemRecord>();
  for (const record of records) {
    seen.set(recordKey(record), record);
  }

  return [...seen.values()];
}

export function buildUpsertStatement(
  qualifiedTable: string,
  rows: readonly ItemRecord[],
): { text: string; values: unknown[] } {
  const values: unknown[] = [];
  const placeholders: string[] = [];
  let param = 1;

  for (const row of rows) {
    const slots = COLUMNS.map((_, offset) => `$${param + offset}`);
    placeholders.push(`(${slots.join(',')},NOW())`);
    values.push(...COLUMNS.map((column) => column.value(row)));
    param += COLUMNS.length;
  }

  const text =
    `INSERT INTO ${qualifiedTable} (${COLUMN_LIST}) VALUES ${placeholders.join(',')} ` +
    `ON CONFLICT (${KEY_COLUMNS.join(', ')}) DO UPDATE SET ${UPDATE_SET}`;

  return { text, values };
}

/**
 * Upserts into `schema.table` keyed by `(channel_id, video_id)`. Each call is
 * one transaction; `first_scraped_at` is set on insert and never updated.
 */
export class PostgresItemSink implements ItemSink {
  private readonly pool: SqlPool;
  private readonly config: PostgresSinkConfig;
  private readonly schema: string;
  private readonly qualifiedTable: string;

  constructor(pool: SqlPool, config?: Partial<PostgresSinkConfig>) {
    this.pool = pool;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.schema = assertIdentifier('schema', this.config.schema);
    this.qualifiedTable = `${this.schema}.${assertIdentifier('table', this.config.table)}`;
  }

  async upsert(records: readonly ItemRecord[]): Promise<UpsertResult> {
    const rows = dedupeByKey(records);
    if (rows.length === 0) {
      return { written: 0 };
    }

    const chunkSize = Math.max(1, this.config.insertChunkSize);
    const client = await this.pool.connect().catch((error: unknown) => {
      throw new PersistenceError('Could not acquire a database connection', {
        cause: error,
      });
    });

    try {
      await client.query('BEGIN');

      for (let start = 0; start < rows.length; start += chunkSize) {
        const { text, values } = buildUpsertStatement(
          this.qualifiedTable,
          rows.slice(start, start + chunkSize),
        );
        await client.query(text, values);
      }

      await client.query('COMMIT');
      sinkLog.debug('Upserted batch', {
        table: this.qualifiedTable,
        rows: rows.length,
        duplicatesCollapsed: records.length - rows.length,
      });

      return { written: rows.length };
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        sinkLog.error('Rollback failed', {
          table: this.qualifiedTable,
          err:
            rollbackError instanceof Error
              ? rollbackError.message
              : String(rollbackError),
        });
      });

      throw new PersistenceError(
        `Upsert into ${this.qualifiedTable} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    } finally {
      client.release();
    }
  }

  async hasEntity(entityId: string): Promise<boolean> {
    try {
      const result = await this.pool.query(
        `SELECT 1 FROM ${this.qualifiedTable} WHERE channel_id = $1 LIMIT 1`,
        [entityId],
      );
      return result.rows.length > 0;
    } catch (error) {
      throw new PersistenceError('Duplicate check failed', { cause: error });
    }
  }

  async ensureSchema(): Promise<void> {
    const columnDdl = COLUMNS.map((column) => `${column.name} ${column.ddl}`);

    try {
      await this.pool.query(`CREATE SCHEMA IF NOT EXISTS ${this.schema}`);
      await this.pool.query(
        `CREATE TABLE IF NOT EXISTS ${this.qualifiedTable} (` +
          [
            ...columnDdl,
            'scraped_at TIMESTAMPTZ NOT NULL DEFAULT NOW()',
            'first_scraped_at TIMESTAMPTZ NOT NULL DEFAULT NOW()',
            `PRIMARY KEY (${KEY_COLUMNS.join(', ')})`,
          ].join(', ') +
          ')',
      );
    } catch (error) {
      throw new PersistenceError(`Could not prepare ${this.qualifiedTable}`, {
        cause: error,
      });
    }

    sinkLog.info('Table ready', { table: this.qualifiedTable });
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

type ConnectionConfig =
  | { connectionString: string }
  | {
      host: string;
      port: number;
      database: string;
      user: string;
      password?: string;
    };

export function createPostgresPool(connection: ConnectionConfig): SqlPool {
  return new pg.Pool({ ...connection, max: 4 });
}

export type { ConnectionConfig };
