import type Database from 'better-sqlite3';
import { AppError, err, ok, toError, type ChatMessage, type Result, type VideoDetail } from '@chatvault/shared';
import { toMessageRow, toVideoWriteParams, type VideoWriteParams } from './row-mappers.ts';
import type { ChatMessageRow, InsertMessagesSummary } from './types.ts';

export interface ChatRepository {
  upsertVideo: (detail: VideoDetail) => Result<void, AppError>;
  /** Duplicate message ids are counted as skipped; a row that fails is counted and the batch continues. */
  insertMessages: (messages: readonly ChatMessage[]) => Result<InsertMessagesSummary, AppError>;
  existsForVideo: (videoId: string) => Result<boolean, AppError>;
}

export interface CreateChatRepositoryOptions {
  now?: () => string;
}

function createDbError(
  code: string,
  message: string,
  context: Record<string, unknown>,
  cause: unknown,
): AppError {
  return AppError.fromCause(code, message, context, cause);
}

export function createChatRepository(
  db: Database.Database,
  options: CreateChatRepositoryOptions = {},
): ChatRepository {
  const now = options.now ?? (() => new Date().toISOString());

  const upsertVideoStmt = db.prepare<VideoWriteParams>(
    `
      INSERT INTO videos (
        video_id, title, url, upload_date, duration, view_count, like_count, comment_count,
        channel_id, channel_name, description, is_live, was_live,
        live_start_timestamp, live_end_timestamp, release_timestamp, thumbnail_url,
        categories, tags, live_status, availability, uploader, uploader_id, updated_at
      )
      VALUES (
        @videoId, @title, @url, @uploadDate, @duration, @viewCount, @likeCount, @commentCount,
        @channelId, @channelName, @description, @isLive, @wasLive,
        @liveStartTimestamp, @liveEndTimestamp, @releaseTimestamp, @thumbnailUrl,
        @categories, @tags, @liveStatus, @availability, @uploader, @uploaderId, @updatedAt
      )
      ON CONFLICT(video_id) DO UPDATE SET
        title = excluded.title,
        url = excluded.url,
        upload_date = excluded.upload_date,
        duration = excluded.duration,
        view_count = excluded.view_count,
        like_count = excluded.like_count,
        comment_count = excluded.comment_count,
        channel_id = excluded.channel_id,
        channel_name = excluded.channel_name,
        description = excluded.description,
        is_live = excluded.is_live,
        was_live = excluded.was_live,
        live_start_timestamp = excluded.live_start_timestamp,
        live_end_timestamp = excluded.live_end_timestamp,
        release_timestamp = excluded.release_timestamp,
        thumbnail_url = excluded.thumbnail_url,
        categories = excluded.categories,
        tags = excluded.tags,
        live_status = excluded.live_status,
        availability = excluded.availability,
        uploader = excluded.uploader,
        uploader_id = excluded.uploader_id,
        updated_at = excluded.updated_at
    `,
  );

  const insertMessageStmt = db.prepare<ChatMessageRow>(
    `
      INSERT INTO chat_messages (
        message_id, video_id, author_name, author_id, message, timestamp_usec, timestamp_text,
        message_type, superchat_amount, superchat_currency, badges, emotes
      )
      VALUES (
        @messageId, @videoId, @authorName, @authorId, @text, @timestampUsec, @timestampText,
        @messageType, @superchatAmount, @superchatCurrency, @badges, @emotes
      )
      ON CONFLICT(message_id) DO NOTHING
    `,
  );

  const existsForVideoStmt = db.prepare<{ videoId: string }, { found: number }>(
    `
      SELECT 1 AS found
      FROM chat_messages
      WHERE video_id = @videoId
      LIMIT 1
    `,
  );

  const insertMessagesTx = db.transaction((messages: readonly ChatMessage[]): InsertMessagesSummary => {
    const summary: InsertMessagesSummary = { inserted: 0, skipped: 0, failed: 0, failures: [] };
    for (const message of messages) {
      try {
        const info = insertMessageStmt.run(toMessageRow(message));
        if (info.changes > 0) {
          summary.inserted += 1;
        } else {
          summary.skipped += 1;
        }
      } catch (cause) {
        // SQLite rolls back only the failing statement; the transaction stays usable.
        summary.failed += 1;
        summary.failures.push({ messageId: message.messageId, reason: toError(cause).message });
      }
    }
    return summary;
  });

  return {
    upsertVideo: (detail) => {
      try {
        upsertVideoStmt.run(toVideoWriteParams(detail, now()));
        return ok(undefined);
      } catch (cause) {
        return err(
          createDbError('DB_VIDEO_UPSERT_FAILED', 'Could not save video details.', { videoId: detail.videoId }, cause),
        );
      }
    },

    insertMessages: (messages) => {
      if (messages.length === 0) {
        return ok({ inserted: 0, skipped: 0, failed: 0, failures: [] });
      }
      try {
        return ok(insertMessagesTx(messages));
      } catch (cause) {
        return err(
          createDbError(
            'DB_MESSAGES_INSERT_FAILED',
            'Could not save chat messages.',
            { items: messages.length, videoId: messages[0]?.videoId },
            cause,
          ),
        );
      }
    },

    existsForVideo: (videoId) => {
      try {
        return ok(existsForVideoStmt.get({ videoId }) !== undefined);
      } catch (cause) {
        return err(
          createDbError('DB_VIDEO_EXISTS_CHECK_FAILED', 'Could not check stored messages for video.', { videoId }, cause),
        );
      }
    },
  };
}
