import type { MigrationDefinition } from './types.ts';

export const chatMessageEmotesMigration: MigrationDefinition = {
  id: 3,
  name: '003-chat-message-emotes',
  up: (db) => {
    db.exec(`
      ALTER TABLE chat_messages ADD COLUMN emotes TEXT;
    `);
  },
};
