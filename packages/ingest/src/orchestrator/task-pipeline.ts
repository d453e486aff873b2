import { createLogger } from '@workspace/logger';
import { FetchError } from '../fetcher/fetch-error.js';
import type {
  ChildItem,
  ChildPage,
  Fetcher,
  StatsSnapshot,
} from '../fetcher/types.js';
import { MAX_STATS_BATCH } from '../fetcher/types.js';
import type { IngestMetrics } from '../observability/metrics.js';
import { mergeItemRecords } from '../pipeline/merge-records.js';
import type { PipelineContext, PipelineResult } from './types.js';

const pipelineLog = createLogger('task-pipeline');

type PagingOptions = {
  maxPages: number;
  callDelayMs: number;
  sleepFn: (ms: number) => Promise<void>;
  metrics?: IngestMetrics;
};

type CollectedChildren = {
  items: ChildItem[];
  pages: number;
  truncated: boolean;
};

function timed<T>(
  metrics: IngestMetrics | undefined,
  operation: string,
  call: () => Promise<T>,
): Promise<T> {
  return metrics ? metrics.time(operation, call) : call();
}

/**
 * Follows continuation tokens until a page comes back without one. Stops early
 * at `maxPages`, when the API hands back a token it already returned, or when a
 * later page reports the listing as not found. A not-found first page throws.
 * Items repeated across pages keep their first occurrence.
 */
export async function collectChildren(
  fetcher: Fetcher,
  listingId: string,
  options: PagingOptions,
): Promise<CollectedChildren> {
  const items = new Map<string, ChildItem>();
  const seenTokens = new Set<string>();
  let pageToken: string | undefined;
  let pages = 0;

  while (pages < options.maxPages) {
    if (pages > 0) {
      await options.sleepFn(options.callDelayMs);
    }

    let page: ChildPage;
    try {
      page = await timed(options.metrics, 'fetchChildren', () =>
        fetcher.fetchChildren(listingId, pageToken),
      );
    } catch (error) {
      // A listing that vanishes mid-walk keeps the pages already read
      if (
        pages > 0 &&
        error instanceof FetchError &&
        error.classification === 'not-found'
      ) {
        pipelineLog.warn('Listing disappeared while paging, keeping partial result', {
          listingId,
          pages,
          items: items.size,
        });
        return { items: [...items.values()], pages, truncated: true };
      }
      throw error;
    }
    pages += 1;

    for (const item of page.items) {
      if (!items.has(item.itemId)) {
        items.set(item.itemId, item);
      }
    }

    const next = page.nextPageToken;
    if (!next) {
      return { items: [...items.values()], pages, truncated: false };
    }

    if (seenTokens.has(next)) {
      pipelineLog.warn('Listing repeated a page token, stopping', {
        listingId,
        pages,
        pageToken: next,
      });
      return { items: [...items.values()], pages, truncated: true };
    }

    seenTokens.add(next);
    pageToken = next;
  }

  pipelineLog.warn('Listing hit the page limit', {
    listingId,
    maxPages: options.maxPages,
    items: items.size,
  });
  return { items: [...items.values()], pages, truncated: true };
}

export async function collectStats(
  fetcher: Fetcher,
  itemIds: readonly string[],
  options: { batchSize: number } & Omit<PagingOptions, 'maxPages'>,
): Promise<Map<string, StatsSnapshot>> {
  const batchSize = Math.min(MAX_STATS_BATCH, Math.max(1, options.batchSize));
  const stats = new Map<string, StatsSnapshot>();

  for (let start = 0; start < itemIds.length; start += batchSize) {
    if (start > 0) {
      await options.sleepFn(options.callDelayMs);
    }

    const batch = itemIds.slice(start, start + batchSize);
    const result = await timed(options.metrics, 'fetchStats', () =>
      fetcher.fetchStats(batch),
    );

    for (const [itemId, snapshot] of result) {
      stats.set(itemId, snapshot);
    }
  }

  return stats;
}

/**
 * One task from handle to merged records:
 * resolve → duplicate guard → entity → children → stats → merge.
 * Failures other than a missing listing propagate to the caller's retry policy.
 */
export async function runTaskPipeline(
  context: PipelineContext,
): Promise<PipelineResult> {
  const { task, fetcher, metrics, sleepFn, callDelayMs } = context;

  const entityId = await timed(metrics, 'resolve', () =>
    fetcher.resolve(task.entityHandle),
  );
  if (!entityId) {
    return { outcome: 'skipped-no-entity', records: [] };
  }

  if (await context.isAlreadyProcessed(entityId)) {
    return { outcome: 'skipped-already-processed', entityId, records: [] };
  }

  await sleepFn(callDelayMs);
  const entity = await timed(metrics, 'fetchEntity', () =>
    fetcher.fetchEntity(entityId),
  );
  if (!entity) {
    return { outcome: 'skipped-no-entity', entityId, records: [] };
  }

  const listingId = entity.childListingId;
  if (!listingId) {
    return { outcome: 'skipped-no-children', entityId, records: [] };
  }

  await sleepFn(callDelayMs);
  let children: CollectedChildren;
  try {
    children = await collectChildren(fetcher, listingId, {
      maxPages: context.maxPages,
      callDelayMs,
      sleepFn,
      metrics,
    });
  } catch (error) {
    if (error instanceof FetchError && error.classification === 'not-found') {
      return { outcome: 'skipped-no-children', entityId, records: [] };
    }
    throw error;
  }

  if (children.items.length === 0) {
    return {
      outcome: 'skipped-no-children',
      entityId,
      records: [],
      pages: children.pages,
    };
  }

  await sleepFn(callDelayMs);
  const stats = await collectStats(
    fetcher,
    children.items.map((item) => item.itemId),
    { batchSize: context.statsBatchSize, callDelayMs, sleepFn, metrics },
  );

  return {
    outcome: 'persisted',
    entityId,
    records: mergeItemRecords(entity, children.items, stats),
    pages: children.pages,
  };
}

export type { CollectedChildren, PagingOptions };
