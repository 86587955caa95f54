import {
  DEFAULT_MESSAGE_TYPE,
  LIVE_STATUSES,
  type Badge,
  type ChatMessage,
  type Emote,
  type VideoDetail,
} from '@chatvault/shared';
import { z } from 'zod/v4';

const ExportEmoteSchema = z.object({
  name: z.string(),
  id: z.string(),
  url: z.string().nullable(),
  is_custom_emoji: z.boolean(),
});

const ExportBadgeSchema = z.object({
  title: z.string(),
  id: z.string().nullable(),
  icon_url: z.string().nullable(),
});

export const ExportVideoInfoSchema = z.object({
  video_id: z.string().min(1),
  title: z.string(),
  url: z.string(),
  upload_date: z.string(),
  duration: z.number().nullable(),
  view_count: z.number().nullable(),
  like_count: z.number().nullable(),
  comment_count: z.number().nullable(),
  channel_id: z.string().nullable(),
  channel_name: z.string().nullable(),
  description: z.string().nullable(),
  is_live: z.boolean(),
  was_live: z.boolean(),
  live_start_timestamp: z.number().nullable(),
  live_end_timestamp: z.number().nullable(),
  release_timestamp: z.number().nullable(),
  thumbnail: z.string().nullable(),
  categories: z.array(z.string()),
  tags: z.array(z.string()),
  live_status: z.enum(LIVE_STATUSES).catch('unknown'),
  availability: z.string().nullable(),
  uploader: z.string().nullable(),
  uploader_id: z.string().nullable(),
});

export const ExportChatMessageSchema = z.object({
  video_id: z.string().min(1),
  message_id: z.string().min(1),
  author_name: z.string().nullable(),
  author_id: z.string().nullable(),
  message: z.string(),
  timestamp_usec: z.number().int().nullable(),
  timestamp_text: z.string().nullable(),
  message_type: z.string().default(DEFAULT_MESSAGE_TYPE),
  superchat_amount: z.number().nullable(),
  superchat_currency: z.string().nullable(),
  badges: z.array(ExportBadgeSchema).nullable(),
  emotes: z.array(ExportEmoteSchema).nullable(),
});

export const ExportFileSchema = z.object({
  video_info: ExportVideoInfoSchema,
  chat_messages: z.array(ExportChatMessageSchema),
  export_metadata: z.object({
    total_messages: z.number().int().nonnegative(),
    exported_at: z.string(),
    video_id: z.string(),
  }),
});

export type ExportVideoInfo = z.infer<typeof ExportVideoInfoSchema>;
export type ExportChatMessage = z.infer<typeof ExportChatMessageSchema>;
export type ExportFile = z.infer<typeof ExportFileSchema>;

function toExportEmote(emote: Emote): z.infer<typeof ExportEmoteSchema> {
  return { name: emote.name, id: emote.id, url: emote.url ?? null, is_custom_emoji: emote.isCustom };
}

function toExportBadge(badge: Badge): z.infer<typeof ExportBadgeSchema> {
  return { title: badge.title, id: badge.id ?? null, icon_url: badge.iconUrl ?? null };
}

export function toExportVideoInfo(detail: VideoDetail): ExportVideoInfo {
  return {
    video_id: detail.videoId,
    title: detail.title,
    url: detail.url,
    upload_date: detail.uploadDate,
    duration: detail.duration ?? null,
    view_count: detail.viewCount,
    like_count: detail.likeCount,
    comment_count: detail.commentCount,
    channel_id: detail.channelId ?? null,
    channel_name: detail.channelName,
    description: detail.description,
    is_live: detail.isLive,
    was_live: detail.wasLive,
    live_start_timestamp: detail.liveStartTimestamp,
    live_end_timestamp: detail.liveEndTimestamp,
    release_timestamp: detail.releaseTimestamp,
    thumbnail: detail.thumbnailUrl,
    categories: detail.categories,
    tags: detail.tags,
    live_status: detail.liveStatus,
    availability: detail.availability,
    uploader: detail.uploader,
    uploader_id: detail.uploaderId,
  };
}

export function toExportChatMessage(message: ChatMessage): ExportChatMessage {
  return {
    video_id: message.videoId,
    message_id: message.messageId,
    author_name: message.authorName ?? null,
    author_id: message.authorId ?? null,
    message: message.text,
    timestamp_usec: message.timestampUsec ?? null,
    timestamp_text: message.timestampText ?? null,
    message_type: message.messageType,
    superchat_amount: message.superchatAmount ?? null,
    superchat_currency: message.superchatCurrency ?? null,
    badges: message.badges ? message.badges.map(toExportBadge) : null,
    emotes: message.emotes ? message.emotes.map(toExportEmote) : null,
  };
}

export function fromExportVideoInfo(info: ExportVideoInfo): VideoDetail {
  return {
    videoId: info.video_id,
    title: info.title,
    url: info.url,
    uploadDate: /^\d{8}$/.test(info.upload_date) ? info.upload_date : '',
    ...(info.duration === null ? {} : { duration: info.duration }),
    ...(info.channel_id === null ? {} : { channelId: info.channel_id }),
    wasLive: info.was_live,
    isLive: info.is_live,
    viewCount: info.view_count,
    likeCount: info.like_count,
    commentCount: info.comment_count,
    liveStartTimestamp: info.live_start_timestamp,
    liveEndTimestamp: info.live_end_timestamp,
    releaseTimestamp: info.release_timestamp,
    thumbnailUrl: info.thumbnail,
    categories: info.categories,
    tags: info.tags,
    channelName: info.channel_name,
    description: info.description,
    uploader: info.uploader,
    uploaderId: info.uploader_id,
    availability: info.availability,
    liveStatus: info.live_status,
  };
}

export function fromExportChatMessage(message: ExportChatMessage): ChatMessage {
  return {
    videoId: message.video_id,
    messageId: message.message_id,
    text: message.message,
    messageType: message.message_type,
    ...(message.author_name === null ? {} : { authorName: message.author_name }),
    ...(message.author_id === null ? {} : { authorId: message.author_id }),
    ...(message.timestamp_usec === null ? {} : { timestampUsec: message.timestamp_usec }),
    ...(message.timestamp_text === null ? {} : { timestampText: message.timestamp_text }),
    ...(message.superchat_amount === null ? {} : { superchatAmount: message.superchat_amount }),
    ...(message.superchat_currency === null ? {} : { superchatCurrency: message.superchat_currency }),
    ...(message.badges === null
      ? {}
      : {
          badges: message.badges.map((badge) => ({
            title: badge.title,
            ...(badge.id === null ? {} : { id: badge.id }),
            ...(badge.icon_url === null ? {} : { iconUrl: badge.icon_url }),
          })),
        }),
    ...(message.emotes === null
      ? {}
      : {
          emotes: message.emotes.map((emote) => ({
            name: emote.name,
            id: emote.id,
            isCustom: emote.is_custom_emoji,
            ...(emote.url === null ? {} : { url: emote.url }),
          })),
        }),
  };
}
