import type {
  ChildItem,
  EntitySnapshot,
  StatsSnapshot,
} from '../fetcher/types.js';
import type { ItemRecord } from '../storage/types.js';

export const EMPTY_STATS: StatsSnapshot = Object.freeze({
  likes: 0,
  comments: 0,
  views: 0,
  tags: '',
  duration: '',
  definition: '',
  categoryId: '',
  license: '',
  madeForKids: false,
});

/**
 * Joins listing, stats and entity shards by item id. Every listed item yields
 * one record; items absent from the stats map get `EMPTY_STATS`.
 */
export function mergeItemRecords(
  entity: EntitySnapshot,
  items: readonly ChildItem[],
  stats: ReadonlyMap<string, StatsSnapshot>,
): ItemRecord[] {
  return items.map((item) => {
    const itemStats = stats.get(item.itemId) ?? EMPTY_STATS;

    return {
      entityId: entity.entityId,
      entityHandle: entity.handle,
      entityTitle: entity.title,
      entityDescription: entity.description,
      subscriberCount: entity.subscriberCount,
      itemCount: entity.itemCount,
      viewCount: entity.viewCount,
      childListingId: entity.childListingId ?? '',
      country: entity.country,
      entityPublishedAt: entity.publishedAt,
      topicCategories: entity.topicCategories,
      entityMadeForKids: entity.madeForKids,
      privacyStatus: entity.privacyStatus,
      itemId: item.itemId,
      title: item.title,
      description: item.description,
      itemPublishedAt: item.publishedAt,
      itemUrl: item.url,
      channelTitle: item.channelTitle,
      tags: itemStats.tags,
      likes: itemStats.likes,
      comments: itemStats.comments,
      views: itemStats.views,
      duration: itemStats.duration,
      definition: itemStats.definition,
      categoryId: itemStats.categoryId,
      license: itemStats.license,
      itemMadeForKids: itemStats.madeForKids,
    };
  });
}
