import { AppError, err, ok, type Result } from '@chatvault/shared';
import { z } from 'zod/v4';

export const JSON_COLUMN_VERSION = 1;

const EnvelopeSchema = z.object({
  version: z.number().int().positive(),
  items: z.array(z.unknown()),
});

export interface DecodedJsonColumn<T> {
  version: number;
  items: T[];
}

/**
 * Serialized list columns are stored as `{"version":1,"items":[...]}`. `undefined`
 * becomes SQL NULL so an absent list stays distinguishable from an empty one.
 */
export function encodeJsonColumn<T>(items: readonly T[] | undefined): string | null {
  if (items === undefined) {
    return null;
  }
  return JSON.stringify({ version: JSON_COLUMN_VERSION, items });
}

/**
 * Reads a stored list column. Bare arrays written before the envelope existed decode as
 * version 0.
 */
export function decodeJsonColumn<T>(
  column: string,
  text: string | null,
  itemSchema: z.ZodType<T>,
): Result<DecodedJsonColumn<T> | null, AppError> {
  if (text === null || text.trim().length === 0) {
    return ok(null);
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch (cause) {
    return err(AppError.fromCause('DB_JSON_COLUMN_INVALID', 'Stored list column is not valid JSON.', { column }, cause));
  }

  let version = 0;
  let rawItems: unknown[];
  if (Array.isArray(decoded)) {
    rawItems = decoded;
  } else {
    const envelope = EnvelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      return err(
        AppError.create('DB_JSON_COLUMN_INVALID', 'Stored list column has an unknown shape.', 'error', { column }),
      );
    }
    if (envelope.data.version > JSON_COLUMN_VERSION) {
      return err(
        AppError.create('DB_JSON_COLUMN_UNSUPPORTED_VERSION', 'Stored list column uses a newer format.', 'error', {
          column,
          version: envelope.data.version,
        }),
      );
    }
    version = envelope.data.version;
    rawItems = envelope.data.items;
  }

  const items = z.array(itemSchema).safeParse(rawItems);
  if (!items.success) {
    return err(
      AppError.create('DB_JSON_COLUMN_INVALID', 'Stored list column contains invalid items.', 'error', {
        column,
        issues: items.error.issues.map((issue) => issue.message),
      }),
    );
  }

  return ok({ version, items: items.data });
}
