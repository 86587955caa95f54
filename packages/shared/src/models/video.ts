import { z } from 'zod/v4';

export const LIVE_STATUSES = ['is_live', 'was_live', 'not_live', 'unknown'] as const;
export type LiveStatus = (typeof LIVE_STATUSES)[number];

/** Upload dates travel as compact `YYYYMMDD` strings; empty when the source has none. */
export const UploadDateSchema = z.string().regex(/^(\d{8})?$/);

export const VideoCandidateSchema = z.object({
  videoId: z.string().min(1),
  title: z.string(),
  duration: z.number().nonnegative().optional(),
  wasLive: z.boolean(),
  isLive: z.boolean(),
  channelId: z.string().optional(),
  uploadDate: UploadDateSchema.optional(),
  url: z.string(),
});

export type VideoCandidate = z.infer<typeof VideoCandidateSchema>;

export const VideoDetailSchema = VideoCandidateSchema.extend({
  uploadDate: UploadDateSchema,
  viewCount: z.number().int().nonnegative().nullable(),
  likeCount: z.number().int().nonnegative().nullable(),
  commentCount: z.number().int().nonnegative().nullable(),
  liveStartTimestamp: z.number().nullable(),
  liveEndTimestamp: z.number().nullable(),
  releaseTimestamp: z.number().nullable(),
  thumbnailUrl: z.string().nullable(),
  categories: z.array(z.string()),
  tags: z.array(z.string()),
  channelName: z.string().nullable(),
  description: z.string().nullable(),
  uploader: z.string().nullable(),
  uploaderId: z.string().nullable(),
  availability: z.string().nullable(),
  liveStatus: z.enum(LIVE_STATUSES),
});

export type VideoDetail = z.infer<typeof VideoDetailSchema>;

export const ChannelInfoSchema = z.object({
  channelId: z.string(),
  name: z.string().nullable(),
  url: z.string(),
  subscriberCount: z.number().int().nonnegative().nullable(),
});

export type ChannelInfo = z.infer<typeof ChannelInfoSchema>;

export function toLiveStatus(value: unknown): LiveStatus {
  return LIVE_STATUSES.find((status) => status === value) ?? 'unknown';
}
