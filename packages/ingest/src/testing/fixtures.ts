import type {
  ChildItem,
  ChildPage,
  EntitySnapshot,
  Fetcher,
  StatsSnapshot,
} from '../fetcher/types.js';
import type { ItemRecord } from '../storage/types.js';

export function makeEntity(overrides?: Partial<EntitySnapshot>): EntitySnapshot {
  return {
    entityId: 'UC-entity-1',
    handle: '@alpha',
    title: 'Alpha',
    description: 'Alpha channel',
    subscriberCount: 1200,
    itemCount: 2,
    viewCount: 50_000,
    childListingId: 'UU-entity-1',
    country: 'US',
    publishedAt: '2020-01-01T00:00:00Z',
    topicCategories: 'https://en.wikipedia.org/wiki/Music',
    madeForKids: false,
    privacyStatus: 'public',
    ...overrides,
  };
}

export function makeItem(itemId: string, overrides?: Partial<ChildItem>): ChildItem {
  return {
    itemId,
    title: `Item ${itemId}`,
    description: `About ${itemId}`,
    publishedAt: '2024-05-01T12:00:00Z',
    url: `https://www.youtube.com/watch?v=${itemId}`,
    channelTitle: 'Alpha',
    ...overrides,
  };
}

export function makeStats(overrides?: Partial<StatsSnapshot>): StatsSnapshot {
  return {
    likes: 10,
    comments: 2,
    views: 300,
    tags: 'music,live',
    duration: 'PT3M20S',
    definition: 'hd',
    categoryId: '10',
    license: 'youtube',
    madeForKids: false,
    ...overrides,
  };
}

export function makeRecord(overrides?: Partial<ItemRecord>): ItemRecord {
  return {
    entityId: 'UC-entity-1',
    entityHandle: '@alpha',
    entityTitle: 'Alpha',
    entityDescription: 'Alpha channel',
    subscriberCount: 1200,
    itemCount: 2,
    viewCount: 50_000,
    childListingId: 'UU-entity-1',
    country: 'US',
    entityPublishedAt: '2020-01-01T00:00:00Z',
    topicCategories: '',
    entityMadeForKids: false,
    privacyStatus: 'public',
    itemId: 'v1',
    title: 'First',
    description: 'First item',
    itemPublishedAt: '2024-05-01T12:00:00Z',
    itemUrl: 'https://www.youtube.com/watch?v=v1',
    channelTitle: 'Alpha',
    tags: '',
    likes: 1,
    comments: 0,
    views: 5,
    duration: 'PT1M',
    definition: 'hd',
    categoryId: '10',
    license: 'youtube',
    itemMadeForKids: false,
    ...overrides,
  };
}

type FakeChannel = {
  entity: EntitySnapshot;
  pages: ChildPage[];
  stats?: Record<string, StatsSnapshot>;
};

type FakeFetcherCalls = {
  resolve: string[];
  fetchEntity: string[];
  fetchChildren: Array<string | undefined>;
  fetchStats: string[][];
};

/**
 * Fetcher backed by a handle → channel table. `failures` lets a test inject an
 * error for a handle's next N resolve calls.
 */
export class FakeFetcher implements Fetcher {
  readonly calls: FakeFetcherCalls;
  private readonly channels: Map<string, FakeChannel>;
  private readonly failures: Map<string, Error[]>;

  constructor(channels: Record<string, FakeChannel>) {
    this.channels = new Map(Object.entries(channels));
    this.failures = new Map();
    this.calls = { resolve: [], fetchEntity: [], fetchChildren: [], fetchStats: [] };
  }

  failNext(handle: string, ...errors: Error[]): this {
    const queued = this.failures.get(handle) ?? [];
    queued.push(...errors);
    this.failures.set(handle, queued);
    return this;
  }

  async resolve(handle: string): Promise<string | null> {
    this.calls.resolve.push(handle);

    const queued = this.failures.get(handle);
    const failure = queued?.shift();
    if (failure) {
      throw failure;
    }

    return this.channels.get(handle)?.entity.entityId ?? null;
  }

  async fetchEntity(entityId: string): Promise<EntitySnapshot | null> {
    this.calls.fetchEntity.push(entityId);
    return this.findByEntity(entityId)?.entity ?? null;
  }

  async fetchChildren(listingId: string, pageToken?: string): Promise<ChildPage> {
    this.calls.fetchChildren.push(pageToken);

    const channel = [...this.channels.values()].find(
      (candidate) => candidate.entity.childListingId === listingId,
    );
    if (!channel) {
      return { items: [] };
    }

    const pageIndex = pageToken === undefined ? 0 : Number(pageToken.replace('page-', ''));
    return channel.pages[pageIndex] ?? { items: [] };
  }

  async fetchStats(itemIds: readonly string[]): Promise<Map<string, StatsSnapshot>> {
    this.calls.fetchStats.push([...itemIds]);

    const result = new Map<string, StatsSnapshot>();
    for (const channel of this.channels.values()) {
      for (const id of itemIds) {
        const stats = channel.stats?.[id];
        if (stats) {
          result.set(id, stats);
        }
      }
    }

    return result;
  }

  private findByEntity(entityId: string): FakeChannel | undefined {
    return [...this.channels.values()].find(
      (channel) => channel.entity.entityId === entityId,
    );
  }
}

/** Builds the pages of a listing; page `i` points at `page-(i+1)`. */
export function pagesOf(...pages: ChildItem[][]): ChildPage[] {
  return pages.map((items, index) =>
    index < pages.length - 1 ? { items, nextPageToken: `page-${index + 1}` } : { items },
  );
}

export type { FakeChannel, FakeFetcherCalls };
