type ItemRecord = {
  entityId: string;
  entityHandle: string;
  entityTitle: string;
  entityDescription: string;
  subscriberCount: number;
  itemCount: number;
  viewCount: number;
  childListingId: string;
  country: string;
  entityPublishedAt: string | null;
  topicCategories: string;
  entityMadeForKids: boolean;
  privacyStatus: string;
  itemId: string;
  title: string;
  description: string;
  itemPublishedAt: string | null;
  itemUrl: string;
  channelTitle: string;
  tags: string;
  likes: number;
  comments: number;
  views: number;
  duration: string;
  definition: string;
  categoryId: string;
  license: string;
  itemMadeForKids: boolean;
};

type UpsertResult = {
  written: number;
};

/**
 * Durable store keyed by `(entityId, itemId)`. `upsert` is all-or-nothing per
 * call and safe to repeat with the same records.
 */
interface ItemSink {
  upsert(records: readonly ItemRecord[]): Promise<UpsertResult>;
  hasEntity(entityId: string): Promise<boolean>;
  ensureSchema(): Promise<void>;
  close(): Promise<void>;
}

type QueryResultLike = {
  rows: unknown[];
  rowCount?: number | null;
};

/** The slice of `pg.PoolClient` the sink relies on. */
interface SqlClient {
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  release(): void;
}

/** The slice of `pg.Pool` the sink relies on. */
interface SqlPool {
  connect(): Promise<SqlClient>;
  query(text: string, values?: unknown[]): Promise<QueryResultLike>;
  end(): Promise<void>;
}

type PostgresSinkConfig = {
  schema: string;
  table: string;
  insertChunkSize: number;
};

export type {
  ItemRecord,
  ItemSink,
  PostgresSinkConfig,
  QueryResultLike,
  SqlClient,
  SqlPool,
  UpsertResult,
};
