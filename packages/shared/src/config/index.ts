import { z } from 'zod/v4';
import { AppError } from '../errors/app-error.ts';
import { LOG_LEVELS, type LogLevel } from '../logger/index.ts';
import { err, ok, type Result } from '../types/result.ts';

export const DEFAULT_DB_PATH = 'data/chatvault.db';
export const DEFAULT_JSON_DIR = 'data/json_exports';
export const DEFAULT_YTDLP_PATH = 'yt-dlp';
export const DEFAULT_VIDEO_DELAY_MS = 2_000;

const optionalString = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value === undefined || value.length === 0 ? undefined : value));

const EnvSchema = z.object({
  CHATVAULT_DB_PATH: optionalString,
  CHATVAULT_JSON_DIR: optionalString,
  CHATVAULT_COOKIES_FILE: optionalString,
  CHATVAULT_YTDLP_PATH: optionalString,
  CHATVAULT_VIDEO_DELAY_MS: z.coerce.number().int().nonnegative().optional(),
  CHATVAULT_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  CHATVAULT_LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
});

export interface AppConfig {
  dbPath: string;
  jsonDir: string;
  cookiesFile: string | null;
  ytdlpPath: string;
  videoDelayMs: number;
  fetchTimeoutMs: number | null;
  logLevel: LogLevel;
}

/**
 * Reads the `CHATVAULT_*` variables. Empty strings count as unset so a blank line in
 * `.env` falls back to the default.
 */
export function loadConfig(env: Record<string, string | undefined>): Result<AppConfig, AppError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return err(
      AppError.create('CONFIG_INVALID_ENV', 'Environment configuration is invalid.', 'error', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
  }

  const values = parsed.data;
  return ok({
    dbPath: values.CHATVAULT_DB_PATH ?? DEFAULT_DB_PATH,
    jsonDir: values.CHATVAULT_JSON_DIR ?? DEFAULT_JSON_DIR,
    cookiesFile: values.CHATVAULT_COOKIES_FILE ?? null,
    ytdlpPath: values.CHATVAULT_YTDLP_PATH ?? DEFAULT_YTDLP_PATH,
    videoDelayMs: values.CHATVAULT_VIDEO_DELAY_MS ?? DEFAULT_VIDEO_DELAY_MS,
    fetchTimeoutMs: values.CHATVAULT_FETCH_TIMEOUT_MS ?? null,
    logLevel: values.CHATVAULT_LOG_LEVEL ?? 'info',
  });
}
