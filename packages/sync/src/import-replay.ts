import { readFile } from 'node:fs/promises';
import type { InsertMessagesSummary } from '@chatvault/core';
import { AppError, err, ok, type Result } from '@chatvault/shared';
import type { DatabaseSink } from './sinks/database-sink.ts';
import { ExportFileSchema, fromExportChatMessage, fromExportVideoInfo, type ExportFile } from './sinks/export-format.ts';

export interface ImportReplayOptions {
  /** Replays even when the video already has stored messages. */
  force?: boolean;
}

export interface ImportReplaySummary extends InsertMessagesSummary {
  videoId: string;
  title: string;
  totalMessages: number;
}

export function parseExportFile(value: unknown, source: string): Result<ExportFile, AppError> {
  const parsed = ExportFileSchema.safeParse(value);
  if (!parsed.success) {
    return err(
      AppError.create('IMPORT_FILE_INVALID', 'Export file does not match the expected layout.', 'error', {
        source,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
  }
  return ok(parsed.data);
}

export async function readExportFile(filePath: string): Promise<Result<ExportFile, AppError>> {
  let raw: string;
  try {
    raw = await readFile(filePath, 'utf8');
  } catch (cause) {
    return err(AppError.fromCause('IMPORT_FILE_READ_FAILED', 'Could not read the export file.', { filePath }, cause));
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (cause) {
    return err(AppError.fromCause('IMPORT_FILE_NOT_JSON', 'Export file is not valid JSON.', { filePath }, cause));
  }

  return parseExportFile(json, filePath);
}

/** Writes a parsed export into the relational store. */
export function replayExport(
  file: ExportFile,
  store: DatabaseSink,
  options: ImportReplayOptions = {},
): Result<ImportReplaySummary, AppError> {
  const detail = fromExportVideoInfo(file.video_info);
  const videoId = detail.videoId;

  if (!options.force) {
    const exists = store.existsForVideo(videoId);
    if (!exists.ok) {
      return exists;
    }
    if (exists.value) {
      return err(
        AppError.warning('IMPORT_VIDEO_EXISTS', 'Video already has stored messages. Use --force to import anyway.', {
          videoId,
        }),
      );
    }
  }

  const messages = file.chat_messages.map(fromExportChatMessage);
  const persisted = store.persist(detail, messages);
  if (!persisted.ok) {
    return persisted;
  }

  return ok({
    ...persisted.value,
    videoId,
    title: detail.title,
    totalMessages: messages.length,
  });
}

export async function importExportFile(
  filePath: string,
  store: DatabaseSink,
  options: ImportReplayOptions = {},
): Promise<Result<ImportReplaySummary, AppError>> {
  const file = await readExportFile(filePath);
  if (!file.ok) {
    return file;
  }
  return replayExport(file.value, store, options);
}
