import type { ChatRepository, InsertMessagesSummary } from '@chatvault/core';
import {
  createLogger,
  type AppError,
  type ChatMessage,
  type Logger,
  type Result,
  type VideoDetail,
} from '@chatvault/shared';

export interface DatabaseSink {
  existsForVideo: (videoId: string) => Result<boolean, AppError>;
  /** Merges the video row, then inserts messages. Duplicates are skipped, never an error. */
  persist: (detail: VideoDetail, messages: readonly ChatMessage[]) => Result<InsertMessagesSummary, AppError>;
}

export interface CreateDatabaseSinkInput {
  repository: ChatRepository;
  logger?: Logger;
}

export function createDatabaseSink(input: CreateDatabaseSinkInput): DatabaseSink {
  const logger = input.logger ?? createLogger({ baseContext: { module: 'database-sink' } });

  return {
    existsForVideo: (videoId) => input.repository.existsForVideo(videoId),

    persist: (detail, messages) => {
      const video = input.repository.upsertVideo(detail);
      if (!video.ok) {
        return video;
      }

      const summary = input.repository.insertMessages(messages);
      if (!summary.ok) {
        return summary;
      }

      for (const failure of summary.value.failures) {
        logger.warning('Chat message row was rejected by the store.', {
          videoId: detail.videoId,
          messageId: failure.messageId,
          reason: failure.reason,
        });
      }
      logger.debug('Persisted video to the database.', {
        videoId: detail.videoId,
        inserted: summary.value.inserted,
        skipped: summary.value.skipped,
        failed: summary.value.failed,
      });
      return summary;
    },
  };
}
