import type { LiveStatus } from '@chatvault/shared';

export interface InsertFailure {
  messageId: string;
  reason: string;
}

export interface InsertMessagesSummary {
  inserted: number;
  skipped: number;
  failed: number;
  failures: InsertFailure[];
}

export interface VideoRow {
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
}

export interface ChatMessageRow {
  messageId: string;
  videoId: string;
  authorName: string | null;
  authorId: string | null;
  text: string;
  timestampUsec: number | null;
  timestampText: string | null;
  messageType: string;
  superchatAmount: number | null;
  superchatCurrency: string | null;
  badges: string | null;
  emotes: string | null;
}

export interface VideoSummaryRecord {
  videoId: string;
  title: string;
  uploadDate: string;
  channelName: string | null;
  liveStatus: LiveStatus;
  messageCount: number;
}

export interface ArchiveStatsRecord {
  videoCount: number;
  messageCount: number;
  authorCount: number;
  superchatCount: number;
}
