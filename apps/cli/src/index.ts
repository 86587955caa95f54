/**
 * chatvault CLI
 *
 * Usage:
 *   chatvault download @somechannel --save-to-db
 *   chatvault validate UCxxxxxxxxxxxxxxxxxxxxxx
 *   chatvault import data/json_exports/20240101_abc123.json
 *   chatvault list-videos --limit 20
 *   chatvault show-video abc123 --style markdown
 */

import { Command, CommanderError } from 'commander';
import { registerCommands } from './commands/index.ts';
import { EXIT_CODES, processIO, type CliContext, type CliIO } from './runtime.ts';
import { VERSION } from './version.ts';

export interface RunCliOptions {
  io?: CliIO;
  env?: Record<string, string | undefined>;
  sleep?: (delayMs: number) => Promise<void>;
}

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('chatvault')
    .description('Incrementally archive livestream chat replays of a channel')
    .version(VERSION, '-V, --version', 'Display version number')
    .option('-v, --verbose', 'Log debug entries and error context')
    .option('--no-color', 'Disable colored output')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => {
        context.io.stdout(text);
      },
      writeErr: (text) => {
        context.io.stderr(text);
      },
    });

  registerCommands(program, context);
  return program;
}

/** Parses `argv` (without the node and script entries) and resolves to the exit code. */
export async function runCli(argv: readonly string[], options: RunCliOptions = {}): Promise<number> {
  const context: CliContext = {
    io: options.io ?? processIO,
    env: options.env ?? process.env,
    ...(options.sleep ? { sleep: options.sleep } : {}),
    exitCode: EXIT_CODES.SUCCESS,
  };
  const program = createProgram(context);

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return context.exitCode;
}

export { EXIT_CODES, type CliContext, type CliIO } from './runtime.ts';
