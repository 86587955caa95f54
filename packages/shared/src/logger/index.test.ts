import { describe, expect, it } from 'vitest';
import { createLogger } from './index.ts';

describe('createLogger', () => {
  it('writes structured entry with level and merged context', () => {
    const entries: unknown[] = [];
    const logger = createLogger({
      baseContext: { module: 'sync' },
      now: () => '2026-01-01T00:00:00.000Z',
      writer: (entry) => entries.push(entry),
    });

    logger.info('channel sync started', { runId: 'run-1' });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'info',
        message: 'channel sync started',
        context: {
          module: 'sync',
          runId: 'run-1',
        },
      },
    ]);
  });

  it('supports withContext for child loggers', () => {
    const entries: unknown[] = [];
    const root = createLogger({
      baseContext: { app: 'cli' },
      now: () => '2026-01-01T00:00:00.000Z',
      writer: (entry) => entries.push(entry),
    });

    const child = root.withContext({ videoId: 'abc123' });
    child.warning('retry', { attempt: 2 });

    expect(entries).toEqual([
      {
        timestamp: '2026-01-01T00:00:00.000Z',
        level: 'warning',
        message: 'retry',
        context: {
          app: 'cli',
          videoId: 'abc123',
          attempt: 2,
        },
      },
    ]);
  });

  it('exposes all level helpers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      now: () => '2026-01-01T00:00:00.000Z',
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.warning('w');
    logger.error('e');

    expect(levels).toEqual(['debug', 'info', 'warning', 'error']);
  });

  it('drops entries below minLevel, also for child loggers', () => {
    const levels: string[] = [];
    const logger = createLogger({
      minLevel: 'warning',
      now: () => '2026-01-01T00:00:00.000Z',
      writer: (entry) => levels.push(entry.level),
    });

    logger.debug('d');
    logger.info('i');
    logger.withContext({ videoId: 'v1' }).info('child info');
    logger.warning('w');
    logger.withContext({ videoId: 'v1' }).error('child error');

    expect(levels).toEqual(['warning', 'error']);
  });
});
