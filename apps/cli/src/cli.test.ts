import { mkdtempSync, readdirSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, describe, expect, it } from 'vitest';
import { formatUploadDate, truncate } from './formatters/summary.ts';
import { createProgram, runCli } from './index.ts';
import { EXIT_CODES, type CliIO } from './runtime.ts';

const fixturePath = fileURLToPath(new URL('../../../fixtures/channel-fixture.json', import.meta.url));
const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs.splice(0)) {
    rmSync(dir, { recursive: true, force: true });
  }
});

interface Workspace {
  dir: string;
  dbPath: string;
  jsonDir: string;
  env: Record<string, string>;
}

function createWorkspace(): Workspace {
  const dir = mkdtempSync(join(tmpdir(), 'chatvault-cli-'));
  tempDirs.push(dir);
  const dbPath = join(dir, 'archive.db');
  const jsonDir = join(dir, 'exports');
  return {
    dir,
    dbPath,
    jsonDir,
    env: { CHATVAULT_DB_PATH: dbPath, CHATVAULT_JSON_DIR: jsonDir, CHATVAULT_LOG_LEVEL: 'error' },
  };
}

interface CapturedRun {
  code: number;
  stdout: string[];
  stderr: string;
}

async function run(argv: string[], env: Record<string, string>): Promise<CapturedRun> {
  let out = '';
  let errText = '';
  const io: CliIO = {
    stdout: (text) => {
      out += text;
    },
    stderr: (text) => {
      errText += text;
    },
  };
  const code = await runCli(['--no-color', ...argv], { io, env, sleep: async () => undefined });
  return { code, stdout: out.split('\n'), stderr: errText };
}

function videoRow(videoId: string, uploaded: string, messages: number, title: string): string {
  return videoId.padEnd(14) + uploaded.padEnd(12) + String(messages).padEnd(10) + 'was_live'.padEnd(10) + title;
}

describe('CLI program', () => {
  it('registers the archive commands', () => {
    const program = createProgram({
      io: { stdout: () => undefined, stderr: () => undefined },
      env: {},
      exitCode: EXIT_CODES.SUCCESS,
    });

    expect(program.name()).toBe('chatvault');
    expect(program.commands.map((command) => command.name())).toEqual([
      'download',
      'validate',
      'import',
      'list-videos',
      'show-video',
    ]);
    expect(program.options.map((option) => option.long)).toEqual(['--version', '--verbose', '--no-color']);
  });

  it('exits cleanly after printing help', async () => {
    const result = await run(['--help'], {});

    expect(result.code).toBe(0);
    expect(result.stdout.join('\n')).toContain('Usage: chatvault [options] [command]');
  });

  it('fails on an unknown command', async () => {
    const result = await run(['explode'], {});

    expect(result.code).toBe(1);
    expect(result.stderr).toContain("unknown command 'explode'");
  });
});

describe('download command', () => {
  it('syncs a channel from a fixture, then stops at stored videos on the next run', async () => {
    const workspace = createWorkspace();

    const first = await run(['download', '@demochannel', '--fixture', fixturePath, '--save-to-db', '--delay-ms', '0'], workspace.env);

    expect(first.code).toBe(0);
    expect(first.stdout.slice(0, 4)).toEqual([
      '[1/4] live004 PERSISTED (3 messages)',
      '[2/4] live003 PERSISTED (2 messages)',
      '[3/4] live002 CHAT_EMPTY',
      '[4/4] live001 PERSISTED (2 messages)',
    ]);
    expect(first.stdout).toContain('Successful: 3');
    expect(first.stdout).toContain('Failed: 1');
    expect(first.stdout).toContain('  live002: Fetching the chat replay failed.');
    expect(readdirSync(workspace.jsonDir).sort()).toEqual([
      '20240101_live001.json',
      '20240303_live003.json',
      '20240404_live004.json',
    ]);

    const second = await run(['download', '@demochannel', '--fixture', fixturePath, '--save-to-db'], workspace.env);

    expect(second.code).toBe(0);
    expect(second.stdout[0]).toBe('[1/4] live004 SKIPPED');
    expect(second.stdout).toContain('Successful: 0');
    expect(second.stdout).toContain('Stopped at the first video that was already synchronized.');
  });

  it('lists the stored videos newest first', async () => {
    const workspace = createWorkspace();
    await run(['download', 'demochannel', '--fixture', fixturePath, '--save-to-db'], workspace.env);

    const listed = await run(['list-videos'], workspace.env);

    expect(listed.code).toBe(0);
    expect(listed.stdout.slice(1, 4)).toEqual([
      videoRow('live004', '2024-04-04', 3, 'Night stream #4'),
      videoRow('live003', '2024-03-03', 2, 'Night stream #3'),
      videoRow('live001', '2024-01-01', 2, 'Night stream #1'),
    ]);

    const limited = await run(['list-videos', '--limit', '1'], workspace.env);
    expect(limited.stdout.slice(1)).toEqual([
      videoRow('live004', '2024-04-04', 3, 'Night stream #4'),
      '',
      'Archive: 3 videos, 7 messages, 3 authors, 1 paid messages',
      '',
    ]);
  });

  it('applies the date and count filters', async () => {
    const workspace = createWorkspace();

    const result = await run(
      ['download', 'demochannel', '--fixture', fixturePath, '--start-date', '2024-03-01', '--max-videos', '1'],
      workspace.env,
    );

    expect(result.code).toBe(0);
    expect(result.stdout[0]).toBe('[1/1] live004 PERSISTED (3 messages)');
    expect(result.stdout).toContain('After filters: 1');
  });

  it('rejects a malformed numeric flag', async () => {
    const workspace = createWorkspace();

    const result = await run(['download', 'demochannel', '--fixture', fixturePath, '--max-videos', 'abc'], workspace.env);

    expect(result.code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(result.stderr).toBe('Error: maxVideos must be an integer of at least 0. (CLI_INVALID_ARGUMENT)\n');
  });

  it('rejects an invalid environment', async () => {
    const result = await run(['list-videos'], { CHATVAULT_VIDEO_DELAY_MS: '-5' });

    expect(result.code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(result.stderr.split('\n')[0]).toBe('Error: Environment configuration is invalid. (CONFIG_INVALID_ENV)');
  });

  it('exits with an error when the channel has no videos', async () => {
    const workspace = createWorkspace();

    const result = await run(['download', 'nobody', '--fixture', fixturePath], workspace.env);

    expect(result.code).toBe(EXIT_CODES.ERROR);
    expect(result.stdout).toContain('No videos found for this channel.');
  });
});

describe('validate command', () => {
  it('prints channel info and the first candidates', async () => {
    const workspace = createWorkspace();

    const result = await run(['validate', '@demochannel', '--fixture', fixturePath], workspace.env);

    expect(result.code).toBe(0);
    expect(result.stdout.slice(0, 4)).toEqual([
      'Channel: Demo Channel',
      'Channel ID: UCdemo0000000000000000001',
      'URL: https://www.youtube.com/channel/UCdemo0000000000000000001',
      'Subscribers: 1200',
    ]);
    expect(result.stdout).toContain('Found 4 livestream candidates');
    expect(result.stdout).toContain('  1. live004  Night stream #4');
    expect(result.stdout).toContain('  4. live001  Night stream #1');
  });

  it('fails when nothing is discovered', async () => {
    const workspace = createWorkspace();

    const result = await run(['validate', 'nobody', '--fixture', fixturePath], workspace.env);

    expect(result.code).toBe(EXIT_CODES.ERROR);
    expect(result.stdout[0]).toBe('Channel info unavailable.');
    expect(result.stdout).toContain('No videos found for this channel.');
  });
});

describe('import command', () => {
  it('imports an export once and requires --force to replay it', async () => {
    const workspace = createWorkspace();
    await run(['download', 'demochannel', '--fixture', fixturePath, '--max-videos', '1'], workspace.env);
    const exportPath = join(workspace.jsonDir, '20240404_live004.json');

    const imported = await run(['import', exportPath], workspace.env);
    expect(imported.code).toBe(0);
    expect(imported.stdout).toEqual([
      'Imported live004: Night stream #4',
      'Messages in file: 3',
      'Inserted: 3',
      'Skipped (duplicates): 0',
      'Failed: 0',
      '',
    ]);

    const refused = await run(['import', exportPath], workspace.env);
    expect(refused.code).toBe(EXIT_CODES.ERROR);
    expect(refused.stderr).toBe(
      'Error: Video already has stored messages. Use --force to import anyway. (IMPORT_VIDEO_EXISTS)\n',
    );

    const forced = await run(['import', exportPath, '--force'], workspace.env);
    expect(forced.code).toBe(0);
    expect(forced.stdout).toContain('Skipped (duplicates): 3');
  });

  it('reports a missing export file', async () => {
    const workspace = createWorkspace();

    const result = await run(['import', join(workspace.dir, 'missing.json')], workspace.env);

    expect(result.code).toBe(EXIT_CODES.ERROR);
    expect(result.stderr.split('\n')[0]).toBe('Error: Could not read the export file. (IMPORT_FILE_READ_FAILED)');
  });
});

describe('show-video command', () => {
  it('prints the stored chat with emotes rendered as text', async () => {
    const workspace = createWorkspace();
    await run(['download', 'demochannel', '--fixture', fixturePath, '--save-to-db', '--max-videos', '1'], workspace.env);

    const shown = await run(['show-video', 'live004'], workspace.env);

    expect(shown.code).toBe(0);
    expect(shown.stdout).toEqual([
      'live004: Night stream #4',
      'Uploaded: 2024-04-04',
      'Messages: 3',
      'With custom emotes: 1',
      'With emoji: 1',
      'Custom emotes used: 1',
      '',
      '[1:00] viewer_one: hello [Emoji: wave] 😊',
      '    Emotes: wave',
      '[2:00] viewer_two: great stream',
      '[-] viewer_three: see you at 1:30',
      '',
      'Top emotes',
      '  wave: 1',
      '',
    ]);
  });

  it('renders emotes as image placeholders or markdown', async () => {
    const workspace = createWorkspace();
    await run(['download', 'demochannel', '--fixture', fixturePath, '--save-to-db', '--max-videos', '1'], workspace.env);

    const images = await run(['show-video', 'live004', '--style', 'images', '--limit', '1'], workspace.env);
    expect(images.stdout.slice(7, 10)).toEqual([
      '[1:00] viewer_one: hello [IMG:wave] 😊',
      '    Emotes: wave',
      '... and 2 more',
    ]);

    const markdown = await run(['show-video', 'live004', '--style', 'markdown', '--limit', '1'], workspace.env);
    expect(markdown.stdout.slice(7, 9)).toEqual([
      '[1:00] viewer_one: hello :wave: 😊',
      '    Emotes: ![wave](https://example.test/wave-48.png)',
    ]);
  });

  it('rejects an unknown style and a missing video', async () => {
    const workspace = createWorkspace();

    const badStyle = await run(['show-video', 'live004', '--style', 'fancy'], workspace.env);
    expect(badStyle.code).toBe(EXIT_CODES.USAGE_ERROR);
    expect(badStyle.stderr).toBe('Error: style must be one of: text, images, markdown. (CLI_INVALID_ARGUMENT)\n');

    const missing = await run(['show-video', 'nothere'], workspace.env);
    expect(missing.code).toBe(EXIT_CODES.ERROR);
    expect(missing.stderr).toBe('Error: No stored video with id nothere. (CLI_VIDEO_NOT_FOUND)\n');
  });
});

describe('formatters', () => {
  it('formats compact upload dates', () => {
    expect(formatUploadDate('20240101')).toBe('2024-01-01');
    expect(formatUploadDate('')).toBe('-');
  });

  it('truncates long titles', () => {
    expect(truncate('abcdefghij', 8)).toBe('abcde...');
    expect(truncate('short', 8)).toBe('short');
  });
});
