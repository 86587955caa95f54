import type { MigrationDefinition } from './types.ts';

export const videoLiveDetailsMigration: MigrationDefinition = {
  id: 2,
  name: '002-video-live-details',
  up: (db) => {
    db.exec(`
      ALTER TABLE videos ADD COLUMN live_start_timestamp INTEGER;
      ALTER TABLE videos ADD COLUMN live_end_timestamp INTEGER;
      ALTER TABLE videos ADD COLUMN release_timestamp INTEGER;
      ALTER TABLE videos ADD COLUMN thumbnail_url TEXT;
      ALTER TABLE videos ADD COLUMN categories TEXT;
      ALTER TABLE videos ADD COLUMN tags TEXT;
      ALTER TABLE videos ADD COLUMN like_count INTEGER;
      ALTER TABLE videos ADD COLUMN comment_count INTEGER;
      ALTER TABLE videos ADD COLUMN live_status TEXT NOT NULL DEFAULT 'unknown';
      ALTER TABLE videos ADD COLUMN availability TEXT;
      ALTER TABLE videos ADD COLUMN uploader TEXT;
      ALTER TABLE videos ADD COLUMN uploader_id TEXT;
    `);
  },
};
