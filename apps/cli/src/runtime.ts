import {
  createChatRepository,
  createDatabaseConnection,
  runMigrations,
  type ChatRepository,
  type DatabaseConnection,
} from '@chatvault/core';
import {
  AppError,
  createLogger,
  err,
  loadConfig,
  ok,
  type AppConfig,
  type Logger,
  type Result,
} from '@chatvault/shared';
import {
  createDatabaseSink,
  createFixtureExtractor,
  createYtDlpExtractor,
  loadExtractorFixtureFromFile,
  type ChannelExtractor,
  type ChatExtractor,
  type DatabaseSink,
} from '@chatvault/sync';
import chalk, { Chalk, type ChalkInstance } from 'chalk';

export const EXIT_CODES = {
  SUCCESS: 0,
  ERROR: 1,
  USAGE_ERROR: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/** Global flags shared by every command. Commander turns `--no-color` into `color: false`. */
export type GlobalOptions = {
  verbose?: boolean;
  color?: boolean;
};

export interface CliContext {
  io: CliIO;
  env: Record<string, string | undefined>;
  sleep?: (delayMs: number) => Promise<void>;
  exitCode: ExitCode;
}

export interface CommandRuntime {
  config: AppConfig;
  logger: Logger;
  colors: ChalkInstance;
  print: (line?: string) => void;
  fail: (error: AppError) => void;
}

export type ChatSource = ChannelExtractor & ChatExtractor;

export interface OpenedStore {
  connection: DatabaseConnection;
  repository: ChatRepository;
  sink: DatabaseSink;
}

export function formatAppError(error: AppError, colors: ChalkInstance, verbose: boolean): string[] {
  const lines = [colors.red(`Error: ${error.message}`) + colors.dim(` (${error.code})`)];
  if (error.cause) {
    lines.push(colors.dim(`  cause: ${error.cause}`));
  }
  if (verbose && Object.keys(error.context).length > 0) {
    lines.push(colors.dim(`  context: ${JSON.stringify(error.context)}`));
  }
  return lines;
}

/**
 * Resolves configuration, logger and output helpers for one command invocation. Returns
 * null after reporting the problem when the environment is invalid.
 */
export function createCommandRuntime(
  context: CliContext,
  globals: GlobalOptions,
  command: string,
): CommandRuntime | null {
  const colors = new Chalk({ level: globals.color === false ? 0 : chalk.level });
  const verbose = globals.verbose === true;
  const print = (line = ''): void => {
    context.io.stdout(`${line}\n`);
  };
  const fail = (error: AppError): void => {
    for (const line of formatAppError(error, colors, verbose)) {
      context.io.stderr(`${line}\n`);
    }
    context.exitCode = EXIT_CODES.ERROR;
  };

  const config = loadConfig(context.env);
  if (!config.ok) {
    for (const line of formatAppError(config.error, colors, true)) {
      context.io.stderr(`${line}\n`);
    }
    context.exitCode = EXIT_CODES.USAGE_ERROR;
    return null;
  }

  const logger = createLogger({
    baseContext: { cli: command },
    minLevel: verbose ? 'debug' : config.value.logLevel,
    writer: (entry) => {
      context.io.stderr(`${JSON.stringify(entry)}\n`);
    },
  });

  return { config: config.value, logger, colors, print, fail };
}

export function openStore(dbPath: string, logger: Logger): Result<OpenedStore, AppError> {
  const connection = createDatabaseConnection({ filename: dbPath });
  if (!connection.ok) {
    return connection;
  }

  const migrations = runMigrations(connection.value.db);
  if (!migrations.ok) {
    const closed = connection.value.close();
    if (!closed.ok) {
      logger.warning('Closing the database after a failed migration failed too.', { code: closed.error.code });
    }
    return migrations;
  }
  if (migrations.value.applied.length > 0) {
    logger.debug('Applied database migrations.', { dbPath, applied: migrations.value.applied });
  }

  const repository = createChatRepository(connection.value.db);
  return ok({
    connection: connection.value,
    repository,
    sink: createDatabaseSink({ repository, logger: logger.withContext({ module: 'database-sink' }) }),
  });
}

export function closeStore(store: OpenedStore, logger: Logger): void {
  const closed = store.connection.close();
  if (!closed.ok) {
    logger.error('Could not close the database.', { code: closed.error.code });
  }
}

export interface ChatSourceOptions {
  fixture?: string;
  cookies?: string;
}

/** Fixture mode replays a recorded fixture; otherwise the yt-dlp binary is used. */
export function createChatSource(
  options: ChatSourceOptions,
  config: AppConfig,
  logger: Logger,
): Result<ChatSource, AppError> {
  if (options.fixture) {
    const fixture = loadExtractorFixtureFromFile(options.fixture);
    if (!fixture.ok) {
      return fixture;
    }
    logger.debug('Using fixture extractor.', { fixture: options.fixture });
    return ok(createFixtureExtractor(fixture.value));
  }

  const cookiesFile = options.cookies ?? config.cookiesFile;
  return ok(
    createYtDlpExtractor({
      binaryPath: config.ytdlpPath,
      logger: logger.withContext({ module: 'ytdlp-extractor' }),
      ...(cookiesFile ? { cookiesFile } : {}),
    }),
  );
}

export function parseIntegerArgument(value: string, name: string, minimum: number | null): Result<number, AppError> {
  const parsed = Number(value);
  if (!/^-?\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed) || (minimum !== null && parsed < minimum)) {
    return err(
      AppError.create(
        'CLI_INVALID_ARGUMENT',
        minimum === null ? `${name} must be an integer.` : `${name} must be an integer of at least ${String(minimum)}.`,
        'error',
        { [name]: value },
      ),
    );
  }
  return ok(parsed);
}
