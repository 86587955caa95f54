import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { ChatMessage, VideoDetail } from '@chatvault/shared';
import { afterEach, describe, expect, it } from 'vitest';
import { createDatabaseConnection, type DatabaseConnection } from './database.ts';
import { runMigrations } from './migrations/index.ts';
import { createArchiveQueries } from './queries/archive-queries.ts';
import { createChatRepository } from './repositories/chat-repository.ts';

function createVideo(overrides: Partial<VideoDetail> = {}): VideoDetail {
  return {
    videoId: 'abc123',
    title: 'Sunday live',
    url: 'https://www.youtube.com/watch?v=abc123',
    uploadDate: '20240101',
    duration: 3600,
    wasLive: true,
    isLive: false,
    channelId: 'UCtestchannel',
    viewCount: 120,
    likeCount: 10,
    commentCount: null,
    liveStartTimestamp: 1704103200,
    liveEndTimestamp: 1704106800,
    releaseTimestamp: 1704103200,
    thumbnailUrl: 'https://img.test/abc123.jpg',
    categories: ['Gaming'],
    tags: ['live', 'speedrun'],
    channelName: 'Test Channel',
    description: 'A test stream',
    uploader: 'Test Channel',
    uploaderId: '@testchannel',
    availability: 'public',
    liveStatus: 'was_live',
    ...overrides,
  };
}

function createMessage(messageId: string, overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    videoId: 'abc123',
    messageId,
    authorName: 'viewer',
    authorId: 'UCviewer',
    text: 'hello :pog:',
    timestampUsec: 1704103200000000,
    timestampText: '0:00',
    messageType: 'text_message',
    emotes: [{ name: 'pog', id: 'e1', url: 'https://img.test/pog.png', isCustom: true }],
    ...overrides,
  };
}

function openMigrated(): DatabaseConnection {
  const connection = createDatabaseConnection();
  if (!connection.ok) {
    throw new Error(connection.error.message);
  }
  const migrations = runMigrations(connection.value.db);
  if (!migrations.ok) {
    throw new Error(migrations.error.message);
  }
  return connection.value;
}

describe('chat archive integration', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it('runs migrations idempotently and creates the archive tables', () => {
    const connection = openMigrated();
    const secondRun = runMigrations(connection.db);
    expect(secondRun.ok).toBe(true);
    if (!secondRun.ok) return;

    expect(secondRun.value.applied).toHaveLength(0);
    expect(secondRun.value.alreadyApplied).toEqual([
      '001-initial-schema',
      '002-video-live-details',
      '003-chat-message-emotes',
    ]);

    const tableNames = connection.db
      .prepare<[], { name: string }>(`SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name ASC`)
      .all()
      .map((row) => row.name);
    expect(tableNames).toEqual(expect.arrayContaining(['videos', 'chat_messages', 'schema_migrations']));
    connection.close();
  });

  it('creates the parent directory of a file database', () => {
    const dir = mkdtempSync(join(tmpdir(), 'chatvault-db-'));
    tempDirs.push(dir);
    const connection = createDatabaseConnection({ filename: join(dir, 'nested', 'archive.db') });
    expect(connection.ok).toBe(true);
    if (!connection.ok) return;
    connection.value.close();
  });

  it('upserts videos by primary key and reads them back', () => {
    const connection = openMigrated();
    const repository = createChatRepository(connection.db, { now: () => '2026-01-01T00:00:00.000Z' });
    const queries = createArchiveQueries(connection.db);

    expect(repository.upsertVideo(createVideo()).ok).toBe(true);
    expect(repository.upsertVideo(createVideo({ title: 'Sunday live (edited)', viewCount: 300 })).ok).toBe(true);

    const stored = queries.getVideo('abc123');
    expect(stored.ok).toBe(true);
    if (!stored.ok) return;

    expect(stored.value).toEqual(createVideo({ title: 'Sunday live (edited)', viewCount: 300 }));
    expect(queries.getArchiveStats()).toEqual({
      ok: true,
      value: { videoCount: 1, messageCount: 0, authorCount: 0, superchatCount: 0 },
    });
    connection.close();
  });

  it('ignores a second message with the same id and reports it skipped', () => {
    const connection = openMigrated();
    const repository = createChatRepository(connection.db);
    const queries = createArchiveQueries(connection.db);
    expect(repository.upsertVideo(createVideo()).ok).toBe(true);

    const first = repository.insertMessages([createMessage('abc123_0')]);
    const second = repository.insertMessages([createMessage('abc123_0', { text: 'changed' })]);

    expect(first).toEqual({ ok: true, value: { inserted: 1, skipped: 0, failed: 0, failures: [] } });
    expect(second).toEqual({ ok: true, value: { inserted: 0, skipped: 1, failed: 0, failures: [] } });

    const messages = queries.getMessagesForVideo('abc123');
    expect(messages.ok).toBe(true);
    if (!messages.ok) return;
    expect(messages.value).toEqual([createMessage('abc123_0')]);
    connection.close();
  });

  it('counts rows that break a constraint without aborting the batch', () => {
    const connection = openMigrated();
    const repository = createChatRepository(connection.db);
    expect(repository.upsertVideo(createVideo()).ok).toBe(true);

    const result = repository.insertMessages([
      createMessage('abc123_0'),
      createMessage('orphan_0', { videoId: 'missing-video' }),
      createMessage('abc123_1'),
    ]);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.inserted).toBe(2);
    expect(result.value.failed).toBe(1);
    expect(result.value.failures.map((failure) => failure.messageId)).toEqual(['orphan_0']);
    connection.close();
  });

  it('reports whether a video already has messages', () => {
    const connection = openMigrated();
    const repository = createChatRepository(connection.db);
    expect(repository.upsertVideo(createVideo()).ok).toBe(true);

    expect(repository.existsForVideo('abc123')).toEqual({ ok: true, value: false });
    repository.insertMessages([createMessage('abc123_0')]);
    expect(repository.existsForVideo('abc123')).toEqual({ ok: true, value: true });
    connection.close();
  });

  it('returns an error result once the connection is closed', () => {
    const connection = openMigrated();
    const repository = createChatRepository(connection.db);
    connection.close();

    const result = repository.existsForVideo('abc123');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DB_VIDEO_EXISTS_CHECK_FAILED');
  });

  it('lists videos newest first with message counts', () => {
    const connection = openMigrated();
    const repository = createChatRepository(connection.db);
    const queries = createArchiveQueries(connection.db);

    repository.upsertVideo(createVideo());
    repository.upsertVideo(createVideo({ videoId: 'def456', uploadDate: '20240215', title: 'February live' }));
    repository.insertMessages([
      createMessage('abc123_0'),
      createMessage('abc123_1', { superchatAmount: 5, superchatCurrency: 'USD', authorId: 'UCdonor' }),
    ]);

    expect(queries.listVideos()).toEqual({
      ok: true,
      value: [
        {
          videoId: 'def456',
          title: 'February live',
          uploadDate: '20240215',
          channelName: 'Test Channel',
          liveStatus: 'was_live',
          messageCount: 0,
        },
        {
          videoId: 'abc123',
          title: 'Sunday live',
          uploadDate: '20240101',
          channelName: 'Test Channel',
          liveStatus: 'was_live',
          messageCount: 2,
        },
      ],
    });
    expect(queries.listVideos({ limit: 1 })).toMatchObject({ ok: true, value: [{ videoId: 'def456' }] });
    expect(queries.getArchiveStats()).toEqual({
      ok: true,
      value: { videoCount: 2, messageCount: 2, authorCount: 2, superchatCount: 1 },
    });
    connection.close();
  });

  it('decodes legacy bare-array list columns', () => {
    const connection = openMigrated();
    const repository = createChatRepository(connection.db);
    const queries = createArchiveQueries(connection.db);
    repository.upsertVideo(createVideo());
    connection.db.prepare(`UPDATE videos SET tags = '["legacy"]' WHERE video_id = 'abc123'`).run();

    const stored = queries.getVideo('abc123');
    expect(stored.ok).toBe(true);
    if (!stored.ok) return;
    expect(stored.value?.tags).toEqual(['legacy']);
    connection.close();
  });
});
