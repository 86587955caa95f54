import { importExportFile } from '@chatvault/sync';
import type { Command } from 'commander';
import { formatImportSummary } from '../formatters/summary.ts';
import { closeStore, createCommandRuntime, openStore, type CliContext, type GlobalOptions } from '../runtime.ts';

export interface ImportOptions {
  force?: boolean;
  dbPath?: string;
}

export function registerImportCommand(program: Command, context: CliContext): void {
  program
    .command('import <json>')
    .description('Load a JSON export into the database')
    .option('-f, --force', 'Import even when the video already has stored messages')
    .option('--db-path <file>', 'SQLite database file')
    .action(async (jsonPath: string, options: ImportOptions, command: Command) => {
      const globals: GlobalOptions = command.optsWithGlobals();
      const runtime = createCommandRuntime(context, globals, 'import');
      if (runtime === null) {
        return;
      }
      const { config, logger, colors, print, fail } = runtime;

      const store = openStore(options.dbPath ?? config.dbPath, logger);
      if (!store.ok) {
        fail(store.error);
        return;
      }

      try {
        const summary = await importExportFile(jsonPath, store.value.sink, { force: options.force === true });
        if (!summary.ok) {
          fail(summary.error);
          return;
        }
        for (const line of formatImportSummary(summary.value, colors)) {
          print(line);
        }
      } finally {
        closeStore(store.value, logger);
      }
    });
}
