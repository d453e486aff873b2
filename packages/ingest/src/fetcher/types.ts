import type { Credential } from '../credentials/types.js';

const MAX_STATS_BATCH = 50;

type EntitySnapshot = {
  entityId: string;
  handle: string;
  title: string;
  description: string;
  subscriberCount: number;
  itemCount: number;
  viewCount: number;
  childListingId: string | undefined;
  country: string;
  publishedAt: string | null;
  topicCategories: string;
  madeForKids: boolean;
  privacyStatus: string;
};

type ChildItem = {
  itemId: string;
  title: string;
  description: string;
  publishedAt: string | null;
  url: string;
  channelTitle: string;
};

type ChildPage = {
  items: ChildItem[];
  nextPageToken?: string;
};

type StatsSnapshot = {
  likes: number;
  comments: number;
  views: number;
  tags: string;
  duration: string;
  definition: string;
  categoryId: string;
  license: string;
  madeForKids: boolean;
};

/**
 * External metadata API. Not-found targets resolve to `null`; every other
 * failure is thrown as a `FetchError`.
 */
interface Fetcher {
  resolve(handle: string): Promise<string | null>;
  fetchEntity(entityId: string): Promise<EntitySnapshot | null>;
  fetchChildren(listingId: string, pageToken?: string): Promise<ChildPage>;
  fetchStats(itemIds: readonly string[]): Promise<Map<string, StatsSnapshot>>;
}

type FetcherFactory = (credential: Credential) => Fetcher;

export { MAX_STATS_BATCH };
export type {
  ChildItem,
  ChildPage,
  EntitySnapshot,
  Fetcher,
  FetcherFactory,
  StatsSnapshot,
};
