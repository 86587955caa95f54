// Database
export {
  createDatabaseConnection,
  closeDatabaseConnection,
  type CreateDatabaseInput,
  type DatabaseConnection,
} from './database.ts';

// Migrations
export {
  MIGRATIONS,
  runMigrations,
  type MigrationDefinition,
  type RunMigrationsResult,
} from './migrations/index.ts';

// Repositories (mutation layer)
export {
  createChatRepository,
  type ChatRepository,
  encodeJsonColumn,
  decodeJsonColumn,
  JSON_COLUMN_VERSION,
  type DecodedJsonColumn,
} from './repositories/index.ts';
export type {
  ArchiveStatsRecord,
  InsertFailure,
  InsertMessagesSummary,
  VideoSummaryRecord,
} from './repositories/index.ts';

// Queries
export { createArchiveQueries, type ArchiveQueries, type ListVideosInput } from './queries/index.ts';
