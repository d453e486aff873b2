import type { ItemRecord, ItemSink, UpsertResult } from './types.js';

function recordKey(record: Pick<ItemRecord, 'entityId' | 'itemId'>): string {
  return `${record.entityId}\u0000${record.itemId}`;
}

/**
 * Process-local sink used for dry runs. Same keying and overwrite rules as the
 * Postgres table, without durability.
 */
export class InMemoryItemSink implements ItemSink {
  private readonly rows: Map<string, ItemRecord>;
  private readonly entities: Set<string>;
  private upsertCalls: number;

  constructor() {
    this.rows = new Map();
    this.entities = new Set();
    this.upsertCalls = 0;
  }

  async upsert(records: readonly ItemRecord[]): Promise<UpsertResult> {
    this.upsertCalls += 1;

    const batch = new Map<string, ItemRecord>();
    for (const record of records) {
      batch.set(recordKey(record), { ...record });
    }

    for (const [key, record] of batch) {
      this.rows.set(key, record);
      this.entities.add(record.entityId);
    }

    return { written: batch.size };
  }

  async hasEntity(entityId: string): Promise<boolean> {
    return this.entities.has(entityId);
  }

  async ensureSchema(): Promise<void> {}

  async close(): Promise<void> {}

  get size(): number {
    return this.rows.size;
  }

  get upsertCount(): number {
    return this.upsertCalls;
  }

  all(): ItemRecord[] {
    return [...this.rows.values()];
  }

  get(entityId: string, itemId: string): ItemRecord | undefined {
    return this.rows.get(recordKey({ entityId, itemId }));
  }
}
