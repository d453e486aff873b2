import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import type { z } from 'zod';
import { createLogger } from '@workspace/logger';
import type { Credential } from '../credentials/types.js';
import { FetchError, type FetchErrorClassification, type FetchOperation } from './fetch-error.js';
import type {
  ChildItem,
  ChildPage,
  EntitySnapshot,
  Fetcher,
  FetcherFactory,
  StatsSnapshot,
} from './types.js';
import { MAX_STATS_BATCH } from './types.js';
import {
  apiErrorSchema,
  channelListSchema,
  playlistItemListSchema,
  videoListSchema,
  type ChannelResource,
  type PlaylistItemResource,
  type VideoResource,
} from './youtube-schemas.js';

const clientLog = createLogger('youtube-client');

const DEFAULT_BASE_URL = 'https://www.googleapis.com/youtube/v3';
const DESCRIPTION_LIMIT = 1000;
const PAGE_SIZE = 50;
const CHANNEL_ID_PATTERN = /^UC[A-Za-z0-9_-]{22}$/;

const QUOTA_REASONS = new Set(['quotaExceeded', 'dailyLimitExceeded']);
const AUTH_REASONS = new Set([
  'keyInvalid',
  'keyExpired',
  'accessNotConfigured',
  'ipRefererBlocked',
]);
const NOT_FOUND_REASONS = new Set([
  'playlistNotFound',
  'channelNotFound',
  'videoNotFound',
  'playlistItemsNotAccessible',
]);

type YouTubeClientOptions = {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
};

type ApiFailure = {
  status: number;
  reason: string | undefined;
  message: string;
};

/**
 * Maps an API error to its retry classification. Reason codes take precedence
 * over the status, since quota and key problems both arrive as 403.
 */
export function classifyApiFailure({ status, reason }: ApiFailure): FetchErrorClassification {
  if (reason !== undefined && QUOTA_REASONS.has(reason)) {
    return 'quota-exhausted';
  }

  if (reason !== undefined && NOT_FOUND_REASONS.has(reason)) {
    return 'not-found';
  }

  if (status === 401 || (reason !== undefined && AUTH_REASONS.has(reason))) {
    return 'fatal-auth';
  }

  if (status === 404) {
    return 'not-found';
  }

  return 'transient';
}

function parseApiFailure(status: number, body: unknown): ApiFailure {
  const parsed = apiErrorSchema.safeParse(body);
  if (!parsed.success) {
    return { status, reason: undefined, message: `HTTP ${status}` };
  }

  const detail = parsed.data.error;
  return {
    status,
    reason: detail.errors?.[0]?.reason,
    message: detail.message ?? detail.errors?.[0]?.message ?? `HTTP ${status}`,
  };
}

function toCount(value: string | number | undefined): number {
  if (value === undefined) {
    return 0;
  }

  const parsed = typeof value === 'number' ? value : Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : 0;
}

function truncate(value: string | undefined): string {
  return (value ?? '').slice(0, DESCRIPTION_LIMIT);
}

function toEntitySnapshot(channel: ChannelResource): EntitySnapshot {
  return {
    entityId: channel.id,
    handle: channel.snippet?.customUrl ?? '',
    title: channel.snippet?.title ?? '',
    description: truncate(channel.snippet?.description),
    subscriberCount: toCount(channel.statistics?.subscriberCount),
    itemCount: toCount(channel.statistics?.videoCount),
    viewCount: toCount(channel.statistics?.viewCount),
    childListingId: channel.contentDetails?.relatedPlaylists?.uploads,
    country: channel.snippet?.country ?? '',
    publishedAt: channel.snippet?.publishedAt ?? null,
    topicCategories: (channel.topicDetails?.topicCategories ?? []).join('|'),
    madeForKids: channel.status?.madeForKids ?? false,
    privacyStatus: channel.status?.privacyStatus ?? '',
  };
}

function toChildItem(item: PlaylistItemResource): ChildItem | undefined {
  const itemId = item.contentDetails?.videoId ?? item.snippet?.resourceId?.videoId;
  if (!itemId) {
    return undefined;
  }

  return {
    itemId,
    title: item.snippet?.title ?? '',
    description: truncate(item.snippet?.description),
    publishedAt:
      item.snippet?.publishedAt ?? item.contentDetails?.videoPublishedAt ?? null,
    url: `https://www.youtube.com/watch?v=${itemId}`,
    channelTitle: item.snippet?.channelTitle ?? '',
  };
}

function toStatsSnapshot(video: VideoResource): StatsSnapshot {
  return {
    likes: toCount(video.statistics?.likeCount),
    comments: toCount(video.statistics?.commentCount),
    views: toCount(video.statistics?.viewCount),
    tags: (video.snippet?.tags ?? []).join(','),
    duration: video.contentDetails?.duration ?? '',
    definition: video.contentDetails?.definition ?? '',
    categoryId: video.snippet?.categoryId ?? '',
    license: video.status?.license ?? '',
    madeForKids: video.status?.madeForKids ?? false,
  };
}

/**
 * YouTube Data API v3 client bound to one API key. Every non-2xx response,
 * network failure and malformed body is raised as a classified `FetchError`.
 */
export class YouTubeDataClient implements Fetcher {
  private readonly apiKey: string;
  private readonly http: AxiosInstance;

  constructor(options: YouTubeClientOptions) {
    this.apiKey = options.apiKey;
    this.http =
      options.http ??
      createYouTubeHttp(options.baseUrl ?? DEFAULT_BASE_URL, options.timeoutMs ?? 10_000);
  }

  async resolve(handle: string): Promise<string | null> {
    const trimmed = handle.trim();
    if (trimmed.length === 0) {
      return null;
    }

    const params: Record<string, string> = CHANNEL_ID_PATTERN.test(trimmed)
      ? { part: 'id', id: trimmed }
      : { part: 'id', forHandle: trimmed.startsWith('@') ? trimmed : `@${trimmed}` };

    const body = await this.request('resolve', '/channels', params, channelListSchema);
    return body?.items?.[0]?.id ?? null;
  }

  async fetchEntity(entityId: string): Promise<EntitySnapshot | null> {
    const body = await this.request(
      'fetchEntity',
      '/channels',
      { part: 'snippet,statistics,contentDetails,topicDetails,status', id: entityId },
      channelListSchema,
    );

    const channel = body?.items?.[0];
    return channel ? toEntitySnapshot(channel) : null;
  }

  async fetchChildren(listingId: string, pageToken?: string): Promise<ChildPage> {
    const body = await this.request(
      'fetchChildren',
      '/playlistItems',
      {
        part: 'snippet,contentDetails',
        playlistId: listingId,
        maxResults: PAGE_SIZE,
        ...(pageToken ? { pageToken } : {}),
      },
      playlistItemListSchema,
      { notFoundAsNull: false },
    );

    const items: ChildItem[] = [];
    for (const raw of body?.items ?? []) {
      const item = toChildItem(raw);
      if (item) {
        items.push(item);
      }
    }

    const nextPageToken = body?.nextPageToken;
    return nextPageToken ? { items, nextPageToken } : { items };
  }

  async fetchStats(itemIds: readonly string[]): Promise<Map<string, StatsSnapshot>> {
    if (itemIds.length > MAX_STATS_BATCH) {
      throw new RangeError(
        `fetchStats accepts at most ${MAX_STATS_BATCH} ids, got ${itemIds.length}`,
      );
    }

    const stats = new Map<string, StatsSnapshot>();
    if (itemIds.length === 0) {
      return stats;
    }

    const body = await this.request(
      'fetchStats',
      '/videos',
      { part: 'statistics,snippet,contentDetails,status', id: itemIds.join(',') },
      videoListSchema,
    );

    for (const video of body?.items ?? []) {
      stats.set(video.id, toStatsSnapshot(video));
    }

    return stats;
  }

  /** `null` means the API answered not-found and the caller asked for that as a value. */
  private async request<T>(
    operation: FetchOperation,
    path: string,
    params: Record<string, string | number>,
    schema: z.ZodType<T>,
    options: { notFoundAsNull: boolean } = { notFoundAsNull: true },
  ): Promise<T | null> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(path, {
        params: { ...params, key: this.apiKey },
        validateStatus: () => true,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError({
        classification: 'transient',
        operation,
        message: `${operation} request failed: ${message}`,
        cause: error,
      });
    }

    if (response.status >= 400) {
      const failure = parseApiFailure(response.status, response.data);
      const classification = classifyApiFailure(failure);

      if (classification === 'not-found' && options.notFoundAsNull) {
        return null;
      }

      clientLog.debug('API call failed', {
        operation,
        status: failure.status,
        reason: failure.reason,
        classification,
      });

      throw new FetchError({
        classification,
        operation,
        message: `${operation} failed with ${failure.status}${failure.reason ? ` (${failure.reason})` : ''}: ${failure.message}`,
        status: failure.status,
        reason: failure.reason,
      });
    }

    const parsed = schema.safeParse(response.data);
    if (!parsed.success) {
      throw new FetchError({
        classification: 'transient',
        operation,
        message: `${operation} returned a malformed response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        status: response.status,
        cause: parsed.error,
      });
    }

    return parsed.data;
  }
}

export function createYouTubeHttp(baseUrl: string, timeoutMs: number): AxiosInstance {
  return axios.create({
    baseURL: baseUrl,
    timeout: timeoutMs,
    headers: { Accept: 'application/json' },
  });
}

/** One client per credential; all share the same HTTP instance. */
export function createYouTubeFetcherFactory(options: {
  baseUrl?: string;
  timeoutMs?: number;
  http?: AxiosInstance;
}): FetcherFactory {
  const http =
    options.http ??
    createYouTubeHttp(options.baseUrl ?? DEFAULT_BASE_URL, options.timeoutMs ?? 10_000);

  return (credential: Credential) =>
    new YouTubeDataClient({ apiKey: credential.secret, http });
}

export type { YouTubeClientOptions };
