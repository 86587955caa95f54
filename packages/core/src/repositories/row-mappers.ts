import {
  AppError,
  BadgeSchema,
  EmoteSchema,
  err,
  ok,
  toLiveStatus,
  type ChatMessage,
  type Result,
  type VideoDetail,
} from '@chatvault/shared';
import { z } from 'zod/v4';
import { decodeJsonColumn, encodeJsonColumn } from './json-columns.ts';
import type { ChatMessageRow, VideoRow } from './types.ts';

const StringItemSchema = z.string();

export interface VideoWriteParams {
  videoId: string;
  title: string;
  url: string;
  uploadDate: string;
  duration: number | null;
  viewCount: number | null;
  likeCount: number | null;
  commentCount: number | null;
  channelId: string | null;
  channelName: string | null;
  description: string | null;
  isLive: number;
  wasLive: number;
  liveStartTimestamp: number | null;
  liveEndTimestamp: number | null;
  releaseTimestamp: number | null;
  thumbnailUrl: string | null;
  categories: string | null;
  tags: string | null;
  liveStatus: string;
  availability: string | null;
  uploader: string | null;
  uploaderId: string | null;
  updatedAt: string;
}

function toSqliteBool(value: boolean): number {
  return value ? 1 : 0;
}

export function toVideoWriteParams(detail: VideoDetail, updatedAt: string): VideoWriteParams {
  return {
    videoId: detail.videoId,
    title: detail.title,
    url: detail.url,
    uploadDate: detail.uploadDate,
    duration: detail.duration ?? null,
    viewCount: detail.viewCount,
    likeCount: detail.likeCount,
    commentCount: detail.commentCount,
    channelId: detail.channelId ?? null,
    channelName: detail.channelName,
    description: detail.description,
    isLive: toSqliteBool(detail.isLive),
    wasLive: toSqliteBool(detail.wasLive),
    liveStartTimestamp: detail.liveStartTimestamp,
    liveEndTimestamp: detail.liveEndTimestamp,
    releaseTimestamp: detail.releaseTimestamp,
    thumbnailUrl: detail.thumbnailUrl,
    categories: encodeJsonColumn(detail.categories),
    tags: encodeJsonColumn(detail.tags),
    liveStatus: detail.liveStatus,
    availability: detail.availability,
    uploader: detail.uploader,
    uploaderId: detail.uploaderId,
    updatedAt,
  };
}

export function toMessageRow(message: ChatMessage): ChatMessageRow {
  return {
    messageId: message.messageId,
    videoId: message.videoId,
    authorName: message.authorName ?? null,
    authorId: message.authorId ?? null,
    text: message.text,
    timestampUsec: message.timestampUsec ?? null,
    timestampText: message.timestampText ?? null,
    messageType: message.messageType,
    superchatAmount: message.superchatAmount ?? null,
    superchatCurrency: message.superchatCurrency ?? null,
    badges: encodeJsonColumn(message.badges),
    emotes: encodeJsonColumn(message.emotes),
  };
}

export function fromVideoRow(row: VideoRow): Result<VideoDetail, AppError> {
  const categories = decodeJsonColumn('categories', row.categories, StringItemSchema);
  if (!categories.ok) {
    return err(categories.error.withContext({ videoId: row.videoId }));
  }
  const tags = decodeJsonColumn('tags', row.tags, StringItemSchema);
  if (!tags.ok) {
    return err(tags.error.withContext({ videoId: row.videoId }));
  }

  return ok({
    videoId: row.videoId,
    title: row.title,
    url: row.url,
    uploadDate: row.uploadDate,
    ...(row.duration === null ? {} : { duration: row.duration }),
    ...(row.channelId === null ? {} : { channelId: row.channelId }),
    wasLive: row.wasLive === 1,
    isLive: row.isLive === 1,
    viewCount: row.viewCount,
    likeCount: row.likeCount,
    commentCount: row.commentCount,
    liveStartTimestamp: row.liveStartTimestamp,
    liveEndTimestamp: row.liveEndTimestamp,
    releaseTimestamp: row.releaseTimestamp,
    thumbnailUrl: row.thumbnailUrl,
    categories: categories.value?.items ?? [],
    tags: tags.value?.items ?? [],
    channelName: row.channelName,
    description: row.description,
    uploader: row.uploader,
    uploaderId: row.uploaderId,
    availability: row.availability,
    liveStatus: toLiveStatus(row.liveStatus),
  });
}

export function fromMessageRow(row: ChatMessageRow): Result<ChatMessage, AppError> {
  const badges = decodeJsonColumn('badges', row.badges, BadgeSchema);
  if (!badges.ok) {
    return err(badges.error.withContext({ messageId: row.messageId }));
  }
  const emotes = decodeJsonColumn('emotes', row.emotes, EmoteSchema);
  if (!emotes.ok) {
    return err(emotes.error.withContext({ messageId: row.messageId }));
  }

  return ok({
    videoId: row.videoId,
    messageId: row.messageId,
    text: row.text,
    messageType: row.messageType,
    ...(row.authorName === null ? {} : { authorName: row.authorName }),
    ...(row.authorId === null ? {} : { authorId: row.authorId }),
    ...(row.timestampUsec === null ? {} : { timestampUsec: row.timestampUsec }),
    ...(row.timestampText === null ? {} : { timestampText: row.timestampText }),
    ...(row.superchatAmount === null ? {} : { superchatAmount: row.superchatAmount }),
    ...(row.superchatCurrency === null ? {} : { superchatCurrency: row.superchatCurrency }),
    ...(badges.value === null ? {} : { badges: badges.value.items }),
    ...(emotes.value === null ? {} : { emotes: emotes.value.items }),
  });
}
