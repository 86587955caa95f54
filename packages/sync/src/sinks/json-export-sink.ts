import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { AppError, err, ok, type ChatMessage, type Result, type VideoDetail } from '@chatvault/shared';
import { toExportChatMessage, toExportVideoInfo, type ExportFile } from './export-format.ts';

export interface JsonExportSink {
  readonly outputDir: string;
  write: (videoId: string, detail: VideoDetail, messages: readonly ChatMessage[]) => Promise<Result<string, AppError>>;
}

export interface CreateJsonExportSinkInput {
  outputDir: string;
  now?: () => Date;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local calendar date as `YYYYMMDD`. */
export function toLocalCompactDate(date: Date): string {
  return `${String(date.getFullYear())}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
}

export function exportFileName(videoId: string, uploadDate: string, now: Date): string {
  const datePart = uploadDate.length >= 8 ? uploadDate.slice(0, 8) : toLocalCompactDate(now);
  return `${datePart}_${videoId}.json`;
}

export function buildExportFile(
  videoId: string,
  detail: VideoDetail,
  messages: readonly ChatMessage[],
  exportedAt: Date,
): ExportFile {
  return {
    video_info: toExportVideoInfo(detail),
    chat_messages: messages.map(toExportChatMessage),
    export_metadata: {
      total_messages: messages.length,
      exported_at: exportedAt.toISOString(),
      video_id: videoId,
    },
  };
}

/**
 * Writes one file per video. The content goes to a temporary sibling first and is then
 * renamed into place, so a reader never sees a partial file.
 */
export function createJsonExportSink(input: CreateJsonExportSinkInput): JsonExportSink {
  const now = input.now ?? (() => new Date());

  return {
    outputDir: input.outputDir,
    write: async (videoId, detail, messages) => {
      const exportedAt = now();
      const filePath = join(input.outputDir, exportFileName(videoId, detail.uploadDate, exportedAt));
      const tempPath = `${filePath}.tmp.${String(process.pid)}.${String(exportedAt.getTime())}`;
      // JSON.stringify keeps non-ASCII characters as they are.
      const json = `${JSON.stringify(buildExportFile(videoId, detail, messages, exportedAt), null, 2)}\n`;

      try {
        await mkdir(input.outputDir, { recursive: true });
        await writeFile(tempPath, json, 'utf8');
        await rename(tempPath, filePath);
        return ok(filePath);
      } catch (cause) {
        const cleanupError = await rm(tempPath, { force: true }).then(
          () => null,
          (cleanupCause: unknown) => String(cleanupCause),
        );
        return err(
          AppError.fromCause(
            'EXPORT_WRITE_FAILED',
            'Could not write the chat export file.',
            { videoId, filePath, ...(cleanupError === null ? {} : { cleanupError }) },
            cause,
          ),
        );
      }
    },
  };
}
