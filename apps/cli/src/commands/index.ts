import type { Command } from 'commander';
import type { CliContext } from '../runtime.ts';
import { registerDownloadCommand } from './download.ts';
import { registerImportCommand } from './import.ts';
import { registerListVideosCommand } from './list-videos.ts';
import { registerShowVideoCommand } from './show-video.ts';
import { registerValidateCommand } from './validate.ts';

export function registerCommands(program: Command, context: CliContext): void {
  registerDownloadCommand(program, context);
  registerValidateCommand(program, context);
  registerImportCommand(program, context);
  registerListVideosCommand(program, context);
  registerShowVideoCommand(program, context);
}
