import type Database from 'better-sqlite3';
import { AppError, err, ok, toError, type Result } from '@chatvault/shared';
import { initialSchemaMigration } from './001-initial-schema.ts';
import { videoLiveDetailsMigration } from './002-video-live-details.ts';
import { chatMessageEmotesMigration } from './003-chat-message-emotes.ts';
import type { MigrationDefinition } from './types.ts';

export type { MigrationDefinition } from './types.ts';

export interface RunMigrationsResult {
  applied: string[];
  alreadyApplied: string[];
}

export const MIGRATIONS: ReadonlyArray<MigrationDefinition> = [
  initialSchemaMigration,
  videoLiveDetailsMigration,
  chatMessageEmotesMigration,
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY,
      name TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL
    );
  `);
}

export function runMigrations(db: Database.Database): Result<RunMigrationsResult, AppError> {
  const applied: string[] = [];
  const alreadyApplied: string[] = [];

  try {
    ensureMigrationsTable(db);

    const appliedRows = db
      .prepare<[], { id: number; name: string }>(
        `
          SELECT id, name
          FROM schema_migrations
          ORDER BY id ASC
        `,
      )
      .all();

    const appliedNames = new Set<string>();
    for (const row of appliedRows) {
      appliedNames.add(row.name);
    }

    const insertMigration = db.prepare<{ id: number; name: string; appliedAt: string }>(
      `
        INSERT INTO schema_migrations (id, name, applied_at)
        VALUES (@id, @name, @appliedAt)
      `,
    );

    for (const migration of MIGRATIONS) {
      if (appliedNames.has(migration.name)) {
        alreadyApplied.push(migration.name);
        continue;
      }

      const applyMigrationTx = db.transaction(() => {
        migration.up(db);
        insertMigration.run({
          id: migration.id,
          name: migration.name,
          appliedAt: new Date().toISOString(),
        });
      });

      applyMigrationTx();
      applied.push(migration.name);
    }

    return ok({ applied, alreadyApplied });
  } catch (cause) {
    return err(
      AppError.create(
        'DB_MIGRATION_FAILED',
        'Could not apply database migrations.',
        'error',
        { failedAfter: applied.length },
        toError(cause),
      ),
    );
  }
}
