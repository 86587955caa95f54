import { createArchiveQueries } from '@chatvault/core';
import type { Command } from 'commander';
import { formatArchiveStats, formatVideoTable } from '../formatters/summary.ts';
import {
  closeStore,
  createCommandRuntime,
  EXIT_CODES,
  openStore,
  parseIntegerArgument,
  type CliContext,
  type GlobalOptions,
} from '../runtime.ts';

export interface ListVideosOptions {
  dbPath?: string;
  limit?: string;
}

export function registerListVideosCommand(program: Command, context: CliContext): void {
  program
    .command('list-videos')
    .description('List stored videos with their message counts, newest first')
    .option('--db-path <file>', 'SQLite database file')
    .option('-n, --limit <n>', 'Show at most this many videos')
    .action((options: ListVideosOptions, command: Command) => {
      const globals: GlobalOptions = command.optsWithGlobals();
      const runtime = createCommandRuntime(context, globals, 'list-videos');
      if (runtime === null) {
        return;
      }
      const { config, logger, colors, print, fail } = runtime;

      let limit: number | undefined;
      if (options.limit !== undefined) {
        const parsed = parseIntegerArgument(options.limit, 'limit', 1);
        if (!parsed.ok) {
          fail(parsed.error);
          context.exitCode = EXIT_CODES.USAGE_ERROR;
          return;
        }
        limit = parsed.value;
      }

      const store = openStore(options.dbPath ?? config.dbPath, logger);
      if (!store.ok) {
        fail(store.error);
        return;
      }

      try {
        const queries = createArchiveQueries(store.value.connection.db);
        const videos = queries.listVideos(limit === undefined ? {} : { limit });
        if (!videos.ok) {
          fail(videos.error);
          return;
        }
        for (const line of formatVideoTable(videos.value, colors)) {
          print(line);
        }
        if (videos.value.length === 0) {
          return;
        }
        const stats = queries.getArchiveStats();
        if (!stats.ok) {
          fail(stats.error);
          return;
        }
        print();
        print(formatArchiveStats(stats.value, colors));
      } finally {
        closeStore(store.value, logger);
      }
    });
}
