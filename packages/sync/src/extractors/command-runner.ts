import { spawn } from 'node:child_process';

export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  signal?: AbortSignal;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

/** Runs a command to completion, buffering both streams. Rejects when the process cannot start or is aborted. */
export const spawnCommandRunner: CommandRunner = (command, args, options = {}) =>
  new Promise((resolve, reject) => {
    const child = spawn(command, [...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: process.env,
      ...(options.signal ? { signal: options.signal } : {}),
    });

    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    child.on('error', reject);
    child.on('close', (code) => {
      resolve({ exitCode: code, stdout, stderr });
    });
  });

export interface JsonLines {
  values: unknown[];
  invalidLines: number;
}

/** Splits newline-delimited JSON output. Blank lines and progress text are ignored. */
export function parseJsonLines(output: string): JsonLines {
  const values: unknown[] = [];
  let invalidLines = 0;
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('{')) {
      continue;
    }
    try {
      const value: unknown = JSON.parse(trimmed);
      values.push(value);
    } catch {
      invalidLines += 1;
    }
  }
  return { values, invalidLines };
}
