import type Database from 'better-sqlite3';
import {
  AppError,
  err,
  ok,
  toError,
  toLiveStatus,
  type ChatMessage,
  type Result,
  type VideoDetail,
} from '@chatvault/shared';
import { fromMessageRow, fromVideoRow } from '../repositories/row-mappers.ts';
import type {
  ArchiveStatsRecord,
  ChatMessageRow,
  VideoRow,
  VideoSummaryRecord,
} from '../repositories/types.ts';

interface VideoSummaryRow {
  videoId: string;
  title: string;
  uploadDate: string;
  channelName: string | null;
  liveStatus: string;
  messageCount: number;
}

export interface ListVideosInput {
  limit?: number;
}

export interface ArchiveQueries {
  listVideos: (input?: ListVideosInput) => Result<VideoSummaryRecord[], AppError>;
  getArchiveStats: () => Result<ArchiveStatsRecord, AppError>;
  getVideo: (videoId: string) => Result<VideoDetail | null, AppError>;
  getMessagesForVideo: (videoId: string) => Result<ChatMessage[], AppError>;
}

const VIDEO_COLUMNS = `
  video_id AS videoId,
  title,
  url,
  upload_date AS uploadDate,
  duration,
  view_count AS viewCount,
  like_count AS likeCount,
  comment_count AS commentCount,
  channel_id AS channelId,
  channel_name AS channelName,
  description,
  is_live AS isLive,
  was_live AS wasLive,
  live_start_timestamp AS liveStartTimestamp,
  live_end_timestamp AS liveEndTimestamp,
  release_timestamp AS releaseTimestamp,
  thumbnail_url AS thumbnailUrl,
  categories,
  tags,
  live_status AS liveStatus,
  availability,
  uploader,
  uploader_id AS uploaderId
`;

// -1 disables the SQLite LIMIT.
const NO_LIMIT = -1;

export function createArchiveQueries(db: Database.Database): ArchiveQueries {
  const listVideosStmt = db.prepare<{ limit: number }, VideoSummaryRow>(
    `
      SELECT
        v.video_id AS videoId,
        v.title AS title,
        v.upload_date AS uploadDate,
        v.channel_name AS channelName,
        v.live_status AS liveStatus,
        COUNT(m.id) AS messageCount
      FROM videos v
      LEFT JOIN chat_messages m ON m.video_id = v.video_id
      GROUP BY v.video_id
      ORDER BY v.upload_date DESC, v.video_id ASC
      LIMIT @limit
    `,
  );

  const statsStmt = db.prepare<[], ArchiveStatsRecord>(
    `
      SELECT
        (SELECT COUNT(*) FROM videos) AS videoCount,
        (SELECT COUNT(*) FROM chat_messages) AS messageCount,
        (SELECT COUNT(DISTINCT author_id) FROM chat_messages WHERE author_id IS NOT NULL) AS authorCount,
        (SELECT COUNT(*) FROM chat_messages WHERE superchat_amount IS NOT NULL) AS superchatCount
    `,
  );

  const getVideoStmt = db.prepare<{ videoId: string }, VideoRow>(
    `
      SELECT ${VIDEO_COLUMNS}
      FROM videos
      WHERE video_id = @videoId
    `,
  );

  const getMessagesStmt = db.prepare<{ videoId: string }, ChatMessageRow>(
    `
      SELECT
        message_id AS messageId,
        video_id AS videoId,
        author_name AS authorName,
        author_id AS authorId,
        message AS text,
        timestamp_usec AS timestampUsec,
        timestamp_text AS timestampText,
        message_type AS messageType,
        superchat_amount AS superchatAmount,
        superchat_currency AS superchatCurrency,
        badges,
        emotes
      FROM chat_messages
      WHERE video_id = @videoId
      ORDER BY timestamp_usec ASC, id ASC
    `,
  );

  return {
    listVideos: (input = {}) => {
      try {
        const rows = listVideosStmt.all({ limit: input.limit ?? NO_LIMIT });
        return ok(rows.map((row) => ({ ...row, liveStatus: toLiveStatus(row.liveStatus) })));
      } catch (cause) {
        return err(
          AppError.create('DB_VIDEOS_LIST_FAILED', 'Could not list stored videos.', 'error', {}, toError(cause)),
        );
      }
    },

    getArchiveStats: () => {
      try {
        const row = statsStmt.get();
        return ok(row ?? { videoCount: 0, messageCount: 0, authorCount: 0, superchatCount: 0 });
      } catch (cause) {
        return err(
          AppError.create('DB_ARCHIVE_STATS_FAILED', 'Could not read archive totals.', 'error', {}, toError(cause)),
        );
      }
    },

    getVideo: (videoId) => {
      try {
        const row = getVideoStmt.get({ videoId });
        return row ? fromVideoRow(row) : ok(null);
      } catch (cause) {
        return err(
          AppError.create('DB_VIDEO_READ_FAILED', 'Could not read the stored video.', 'error', { videoId }, toError(cause)),
        );
      }
    },

    getMessagesForVideo: (videoId) => {
      let rows: ChatMessageRow[];
      try {
        rows = getMessagesStmt.all({ videoId });
      } catch (cause) {
        return err(
          AppError.create(
            'DB_MESSAGES_READ_FAILED',
            'Could not read stored chat messages.',
            'error',
            { videoId },
            toError(cause),
          ),
        );
      }

      const messages: ChatMessage[] = [];
      for (const row of rows) {
        const message = fromMessageRow(row);
        if (!message.ok) {
          return message;
        }
        messages.push(message.value);
      }
      return ok(messages);
    },
  };
}
