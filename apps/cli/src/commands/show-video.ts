import { createArchiveQueries } from '@chatvault/core';
import { AppError } from '@chatvault/shared';
import type { Command } from 'commander';
import { EMOTE_STYLES, formatChatTranscript, isEmoteStyle } from '../formatters/chat-transcript.ts';
import {
  closeStore,
  createCommandRuntime,
  EXIT_CODES,
  openStore,
  parseIntegerArgument,
  type CliContext,
  type GlobalOptions,
} from '../runtime.ts';

export const DEFAULT_TRANSCRIPT_LIMIT = 20;

export interface ShowVideoOptions {
  dbPath?: string;
  limit?: string;
  style?: string;
}

export function registerShowVideoCommand(program: Command, context: CliContext): void {
  program
    .command('show-video <videoId>')
    .description('Print the stored chat of one video with its emoji and emote usage')
    .option('--db-path <file>', 'SQLite database file')
    .option('-n, --limit <n>', 'Show at most this many messages', String(DEFAULT_TRANSCRIPT_LIMIT))
    .option('--style <style>', `How custom emotes are rendered: ${EMOTE_STYLES.join(', ')}`, 'text')
    .action((videoId: string, options: ShowVideoOptions, command: Command) => {
      const globals: GlobalOptions = command.optsWithGlobals();
      const runtime = createCommandRuntime(context, globals, 'show-video');
      if (runtime === null) {
        return;
      }
      const { config, logger, colors, print, fail } = runtime;

      const limit = parseIntegerArgument(options.limit ?? String(DEFAULT_TRANSCRIPT_LIMIT), 'limit', 1);
      if (!limit.ok) {
        fail(limit.error);
        context.exitCode = EXIT_CODES.USAGE_ERROR;
        return;
      }
      const style = options.style ?? 'text';
      if (!isEmoteStyle(style)) {
        fail(
          AppError.create('CLI_INVALID_ARGUMENT', `style must be one of: ${EMOTE_STYLES.join(', ')}.`, 'error', {
            style,
          }),
        );
        context.exitCode = EXIT_CODES.USAGE_ERROR;
        return;
      }

      const store = openStore(options.dbPath ?? config.dbPath, logger);
      if (!store.ok) {
        fail(store.error);
        return;
      }

      try {
        const queries = createArchiveQueries(store.value.connection.db);
        const video = queries.getVideo(videoId);
        if (!video.ok) {
          fail(video.error);
          return;
        }
        if (video.value === null) {
          fail(AppError.create('CLI_VIDEO_NOT_FOUND', `No stored video with id ${videoId}.`, 'error', { videoId }));
          return;
        }

        const messages = queries.getMessagesForVideo(videoId);
        if (!messages.ok) {
          fail(messages.error);
          return;
        }
        for (const line of formatChatTranscript(video.value, messages.value, { limit: limit.value, style }, colors)) {
          print(line);
        }
      } finally {
        closeStore(store.value, logger);
      }
    });
}
