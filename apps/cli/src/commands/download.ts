import {
  createDiscovery,
  createJsonExportSink,
  createSyncController,
  type SyncOptions,
} from '@chatvault/sync';
import type { Command } from 'commander';
import { formatProgressLine, formatSyncReport } from '../formatters/summary.ts';
import {
  closeStore,
  createChatSource,
  createCommandRuntime,
  EXIT_CODES,
  openStore,
  parseIntegerArgument,
  type CliContext,
  type GlobalOptions,
} from '../runtime.ts';

export interface DownloadOptions {
  maxVideos?: string;
  startDate?: string;
  endDate?: string;
  startIndex?: string;
  endIndex?: string;
  skipExisting?: boolean;
  stopOnExisting?: boolean;
  saveToDb?: boolean;
  cookies?: string;
  jsonDir?: string;
  dbPath?: string;
  delayMs?: string;
  fixture?: string;
}

interface NumericFlag {
  flag: string;
  value: string | undefined;
  minimum: number | null;
}

export function registerDownloadCommand(program: Command, context: CliContext): void {
  program
    .command('download <channel>')
    .description('Download chat replays of a channel\'s livestreams')
    .option('--max-videos <n>', 'Process at most this many videos (0 = unlimited)')
    .option('--start-date <date>', 'Only videos uploaded on or after this date (YYYY-MM-DD)')
    .option('--end-date <date>', 'Only videos uploaded on or before this date (YYYY-MM-DD)')
    .option('--start-index <n>', 'Slice the discovered list from this index')
    .option('--end-index <n>', 'Slice the discovered list up to this index (exclusive)')
    .option('--skip-existing', 'Skip videos that already have stored messages (default)')
    .option('--no-skip-existing', 'Process videos even when they are already stored')
    .option('--stop-on-existing', 'Stop at the first video that is already stored (default)')
    .option('--no-stop-on-existing', 'Keep going past videos that are already stored')
    .option('--save-to-db', 'Also write videos and messages to the database')
    .option('--cookies <file>', 'Cookies file passed to yt-dlp')
    .option('--json-dir <dir>', 'Directory for JSON exports')
    .option('--db-path <file>', 'SQLite database file')
    .option('--delay-ms <ms>', 'Pause between videos in milliseconds')
    .option('--fixture <file>', 'Replay a recorded extractor fixture instead of calling yt-dlp')
    .action(async (channel: string, options: DownloadOptions, command: Command) => {
      const globals: GlobalOptions = command.optsWithGlobals();
      const runtime = createCommandRuntime(context, globals, 'download');
      if (runtime === null) {
        return;
      }
      const { config, logger, colors, print, fail } = runtime;

      const numbers: Record<string, number | undefined> = {};
      const flags: NumericFlag[] = [
        { flag: 'maxVideos', value: options.maxVideos, minimum: 0 },
        { flag: 'startIndex', value: options.startIndex, minimum: null },
        { flag: 'endIndex', value: options.endIndex, minimum: null },
        { flag: 'delayMs', value: options.delayMs, minimum: 0 },
      ];
      for (const { flag, value, minimum } of flags) {
        if (value === undefined) continue;
        const parsed = parseIntegerArgument(value, flag, minimum);
        if (!parsed.ok) {
          fail(parsed.error);
          context.exitCode = EXIT_CODES.USAGE_ERROR;
          return;
        }
        numbers[flag] = parsed.value;
      }

      const source = createChatSource(options, config, logger);
      if (!source.ok) {
        fail(source.error);
        return;
      }

      const store = openStore(options.dbPath ?? config.dbPath, logger);
      if (!store.ok) {
        fail(store.error);
        return;
      }

      try {
        const controller = createSyncController({
          discovery: createDiscovery({ extractor: source.value, logger: logger.withContext({ module: 'discovery' }) }),
          channelExtractor: source.value,
          chatExtractor: source.value,
          exportSink: createJsonExportSink({ outputDir: options.jsonDir ?? config.jsonDir }),
          store: store.value.sink,
          logger: logger.withContext({ module: 'sync-controller' }),
          videoDelayMs: numbers.delayMs ?? config.videoDelayMs,
          fetchTimeoutMs: config.fetchTimeoutMs,
          ...(context.sleep ? { sleep: context.sleep } : {}),
          hooks: {
            onProgress: (event) => {
              print(formatProgressLine(event, colors));
            },
          },
        });

        const syncOptions: SyncOptions = {
          ...(options.startDate === undefined ? {} : { startDate: options.startDate }),
          ...(options.endDate === undefined ? {} : { endDate: options.endDate }),
          ...(numbers.startIndex === undefined ? {} : { startIndex: numbers.startIndex }),
          ...(numbers.endIndex === undefined ? {} : { endIndex: numbers.endIndex }),
          ...(numbers.maxVideos === undefined ? {} : { maxCount: numbers.maxVideos }),
          ...(options.skipExisting === undefined ? {} : { skipExisting: options.skipExisting }),
          ...(options.stopOnExisting === undefined ? {} : { stopOnExisting: options.stopOnExisting }),
          saveToDatabase: options.saveToDb === true,
        };

        const result = await controller.syncChannel(channel, syncOptions);
        if (!result.ok) {
          fail(result.error);
          return;
        }

        print();
        for (const line of formatSyncReport(result.value, colors)) {
          print(line);
        }
        if (result.value.exhausted) {
          context.exitCode = EXIT_CODES.ERROR;
        }
      } finally {
        closeStore(store.value, logger);
      }
    });
}
