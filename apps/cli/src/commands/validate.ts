import { createDiscovery } from '@chatvault/sync';
import type { Command } from 'commander';
import { formatCandidates, formatChannelInfo } from '../formatters/summary.ts';
import { createChatSource, createCommandRuntime, EXIT_CODES, type CliContext, type GlobalOptions } from '../runtime.ts';

export const VALIDATE_PREVIEW_COUNT = 5;

export interface ValidateOptions {
  cookies?: string;
  fixture?: string;
}

export function registerValidateCommand(program: Command, context: CliContext): void {
  program
    .command('validate <channel>')
    .description('Resolve a channel and list its livestream candidates without downloading')
    .option('--cookies <file>', 'Cookies file passed to yt-dlp')
    .option('--fixture <file>', 'Replay a recorded extractor fixture instead of calling yt-dlp')
    .action(async (channel: string, options: ValidateOptions, command: Command) => {
      const globals: GlobalOptions = command.optsWithGlobals();
      const runtime = createCommandRuntime(context, globals, 'validate');
      if (runtime === null) {
        return;
      }
      const { config, logger, colors, print, fail } = runtime;

      const source = createChatSource(options, config, logger);
      if (!source.ok) {
        fail(source.error);
        return;
      }

      const discovery = createDiscovery({ extractor: source.value, logger: logger.withContext({ module: 'discovery' }) });
      const info = await discovery.resolveChannel(channel);
      for (const line of formatChannelInfo(info, colors)) {
        print(line);
      }

      const candidates = await discovery.discover(channel, { channel: info });
      print();
      if (candidates.length === 0) {
        print(colors.yellow('No videos found for this channel.'));
        context.exitCode = EXIT_CODES.ERROR;
        return;
      }
      for (const line of formatCandidates(candidates, VALIDATE_PREVIEW_COUNT, colors)) {
        print(line);
      }
    });
}
