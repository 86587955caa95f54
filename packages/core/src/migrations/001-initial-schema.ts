import type { MigrationDefinition } from './types.ts';

export const initialSchemaMigration: MigrationDefinition = {
  id: 1,
  name: '001-initial-schema',
  up: (db) => {
    db.exec(`
      CREATE TABLE IF NOT EXISTS videos (
        video_id TEXT PRIMARY KEY,
        title TEXT NOT NULL DEFAULT '',
        url TEXT NOT NULL,
        upload_date TEXT NOT NULL DEFAULT '',
        duration INTEGER,
        view_count INTEGER,
        channel_id TEXT,
        channel_name TEXT,
        description TEXT,
        is_live INTEGER NOT NULL DEFAULT 0,
        was_live INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL DEFAULT (datetime('now')),
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS chat_messages (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        message_id TEXT NOT NULL UNIQUE,
        video_id TEXT NOT NULL REFERENCES videos(video_id),
        author_name TEXT,
        author_id TEXT,
        message TEXT NOT NULL DEFAULT '',
        timestamp_usec INTEGER,
        timestamp_text TEXT,
        message_type TEXT NOT NULL DEFAULT 'text_message',
        superchat_amount REAL,
        superchat_currency TEXT,
        badges TEXT,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );

      CREATE INDEX IF NOT EXISTS idx_videos_upload_date ON videos(upload_date);
      CREATE INDEX IF NOT EXISTS idx_videos_channel ON videos(channel_id);
      CREATE INDEX IF NOT EXISTS idx_chat_messages_video ON chat_messages(video_id);
      CREATE INDEX IF NOT EXISTS idx_chat_messages_author ON chat_messages(author_id);
      CREATE INDEX IF NOT EXISTS idx_chat_messages_timestamp ON chat_messages(video_id, timestamp_usec);
      CREATE INDEX IF NOT EXISTS idx_chat_messages_type ON chat_messages(message_type);
    `);
  },
};
