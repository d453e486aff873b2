import { z } from 'zod';

const countSchema = z.union([z.string(), z.number()]).optional();

export const channelSchema = z.object({
  id: z.string(),
  snippet: z
    .object({
      title: z.string().optional(),
      description: z.string().optional(),
      customUrl: z.string().optional(),
      publishedAt: z.string().optional(),
      country: z.string().optional(),
    })
    .optional(),
  statistics: z
    .object({
      subscriberCount: countSchema,
      videoCount: countSchema,
      viewCount: countSchema,
    })
    .optional(),
  contentDetails: z
    .object({
      relatedPlaylists: z.object({ uploads: z.string().optional() }).optional(),
    })
    .optional(),
  topicDetails: z
    .object({ topicCategories: z.array(z.string()).optional() })
    .optional(),
  status: z
    .object({
      privacyStatus: z.string().optional(),
      madeForKids: z.boolean().optional(),
    })
    .optional(),
});

export const channelListSchema = z.object({
  items: z.array(channelSchema).optional(),
});

export const playlistItemSchema = z.object({
  snippet: z
    .object({
      title: z.string().optional(),
      description: z.string().optional(),
      publishedAt: z.string().optional(),
      channelTitle: z.string().optional(),
      resourceId: z.object({ videoId: z.string().optional() }).optional(),
    })
    .optional(),
  contentDetails: z
    .object({
      videoId: z.string().optional(),
      videoPublishedAt: z.string().optional(),
    })
    .optional(),
});

export const playlistItemListSchema = z.object({
  items: z.array(playlistItemSchema).optional(),
  nextPageToken: z.string().optional(),
});

export const videoSchema = z.object({
  id: z.string(),
  snippet: z
    .object({
      tags: z.array(z.string()).optional(),
      categoryId: z.string().optional(),
    })
    .optional(),
  statistics: z
    .object({
      likeCount: countSchema,
      commentCount: countSchema,
      viewCount: countSchema,
    })
    .optional(),
  contentDetails: z
    .object({
      duration: z.string().optional(),
      definition: z.string().optional(),
    })
    .optional(),
  status: z
    .object({
      license: z.string().optional(),
      madeForKids: z.boolean().optional(),
    })
    .optional(),
});

export const videoListSchema = z.object({
  items: z.array(videoSchema).optional(),
});

export const apiErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string().optional(),
    errors: z
      .array(z.object({ reason: z.string().optional(), message: z.string().optional() }))
      .optional(),
  }),
});

export type ChannelResource = z.infer<typeof channelSchema>;
export type PlaylistItemResource = z.infer<typeof playlistItemSchema>;
export type VideoResource = z.infer<typeof videoSchema>;
