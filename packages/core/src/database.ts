import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { AppError, err, ok, toError, type Result } from '@chatvault/shared';

export interface CreateDatabaseInput {
  filename?: string;
  readonly?: boolean;
  fileMustExist?: boolean;
  timeoutMs?: number;
}

export interface DatabaseConnection {
  readonly db: Database.Database;
  close: () => Result<void, AppError>;
}

function isFileDatabase(filename: string): boolean {
  return filename !== ':memory:' && filename.length > 0;
}

export function createDatabaseConnection(input: CreateDatabaseInput = {}): Result<DatabaseConnection, AppError> {
  const filename = input.filename ?? ':memory:';
  const timeoutMs = input.timeoutMs ?? 5_000;
  const readonly = input.readonly ?? false;

  try {
    if (isFileDatabase(filename) && !readonly) {
      mkdirSync(dirname(filename), { recursive: true });
    }

    const db = new Database(filename, {
      readonly,
      fileMustExist: input.fileMustExist ?? false,
      timeout: timeoutMs,
    });

    db.pragma('foreign_keys = ON');
    db.pragma(`busy_timeout = ${String(timeoutMs)}`);

    if (!db.memory && !readonly) {
      db.pragma('journal_mode = WAL');
    }

    return ok({
      db,
      close: () => closeDatabaseConnection(db),
    });
  } catch (cause) {
    return err(
      AppError.create(
        'DB_OPEN_FAILED',
        'Could not open the chat archive database.',
        'error',
        { filename, timeoutMs },
        toError(cause),
      ),
    );
  }
}

export function closeDatabaseConnection(db: Database.Database): Result<void, AppError> {
  try {
    if (db.open) {
      db.close();
    }
    return ok(undefined);
  } catch (cause) {
    return err(
      AppError.create(
        'DB_CLOSE_FAILED',
        'Could not close the chat archive database.',
        'error',
        { databaseName: db.name },
        toError(cause),
      ),
    );
  }
}
