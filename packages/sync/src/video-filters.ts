import { AppError, createLogger, err, ok, type Logger, type Result, type VideoCandidate } from '@chatvault/shared';

export interface DateRangeInput {
  /** Inclusive, `YYYY-MM-DD`. */
  startDate?: string;
  /** Inclusive, `YYYY-MM-DD`. */
  endDate?: string;
}

/** Validated bounds in the compact `YYYYMMDD` form used by upload dates. */
export interface CompactDateRange {
  start: string | null;
  end: string | null;
}

export interface FilterOptions extends DateRangeInput {
  startIndex?: number;
  endIndex?: number;
  /** Absent or 0 means unlimited. */
  maxCount?: number;
}

export interface FilterDependencies {
  lookupUploadDate: (candidate: VideoCandidate) => Promise<string | null>;
  logger?: Logger;
}

export interface FilterResult {
  candidates: VideoCandidate[];
  removed: {
    date: number;
    index: number;
    maxCount: number;
  };
}

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

function isRealDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

function matchDate(pattern: RegExp, value: string): string | null {
  const match = pattern.exec(value);
  if (!match) {
    return null;
  }
  const [, year = '', month = '', day = ''] = match;
  if (!isRealDate(Number(year), Number(month), Number(day))) {
    return null;
  }
  return `${year}${month}${day}`;
}

/** Returns the compact form of a valid `YYYYMMDD` upload date, or null. */
export function parseUploadDate(value: string | undefined | null): string | null {
  if (!value) {
    return null;
  }
  return matchDate(COMPACT_DATE_PATTERN, value.trim());
}

function parseBound(name: 'startDate' | 'endDate', value: string | undefined): Result<string | null, AppError> {
  if (value === undefined || value.trim().length === 0) {
    return ok(null);
  }
  const compact = matchDate(ISO_DATE_PATTERN, value.trim());
  if (compact === null) {
    return err(
      AppError.create('SYNC_INVALID_INPUT', `Invalid ${name}, expected YYYY-MM-DD.`, 'error', {
        [name]: value,
      }),
    );
  }
  return ok(compact);
}

export function validateDateRange(input: DateRangeInput): Result<CompactDateRange, AppError> {
  const start = parseBound('startDate', input.startDate);
  if (!start.ok) {
    return start;
  }
  const end = parseBound('endDate', input.endDate);
  if (!end.ok) {
    return end;
  }
  return ok({ start: start.value, end: end.value });
}

export function validateFilterOptions(options: FilterOptions): Result<CompactDateRange, AppError> {
  for (const [name, value] of [
    ['startIndex', options.startIndex],
    ['endIndex', options.endIndex],
  ] as const) {
    if (value !== undefined && !Number.isInteger(value)) {
      return err(AppError.create('SYNC_INVALID_INPUT', `${name} must be an integer.`, 'error', { [name]: value }));
    }
  }
  if (options.maxCount !== undefined && (!Number.isInteger(options.maxCount) || options.maxCount < 0)) {
    return err(
      AppError.create('SYNC_INVALID_INPUT', 'maxCount must be a non-negative integer.', 'error', {
        maxCount: options.maxCount,
      }),
    );
  }
  return validateDateRange(options);
}

function isWithin(range: CompactDateRange, uploadDate: string): boolean {
  if (range.start !== null && uploadDate < range.start) {
    return false;
  }
  if (range.end !== null && uploadDate > range.end) {
    return false;
  }
  return true;
}

/**
 * Keeps candidates whose upload date falls inside the range. A candidate whose date is
 * missing after lookup, or cannot be parsed, is kept.
 */
export async function filterByDate(
  candidates: readonly VideoCandidate[],
  range: CompactDateRange,
  lookupUploadDate: FilterDependencies['lookupUploadDate'],
): Promise<VideoCandidate[]> {
  if (range.start === null && range.end === null) {
    return [...candidates];
  }

  const kept: VideoCandidate[] = [];
  for (const candidate of candidates) {
    let withDate = candidate;
    if (!candidate.uploadDate) {
      const looked = await lookupUploadDate(candidate);
      if (looked) {
        withDate = { ...candidate, uploadDate: looked };
      }
    }

    const uploadDate = parseUploadDate(withDate.uploadDate);
    if (uploadDate === null || isWithin(range, uploadDate)) {
      kept.push(withDate);
    }
  }
  return kept;
}

/** Same semantics as `Array.prototype.slice`, negative indices included. */
export function filterByIndex(
  candidates: readonly VideoCandidate[],
  startIndex = 0,
  endIndex?: number,
): VideoCandidate[] {
  return endIndex === undefined ? candidates.slice(startIndex) : candidates.slice(startIndex, endIndex);
}

export function filterByMaxCount(candidates: readonly VideoCandidate[], maxCount?: number): VideoCandidate[] {
  if (maxCount === undefined || maxCount <= 0) {
    return [...candidates];
  }
  return candidates.slice(0, maxCount);
}

/** Date, then index, then count. Stages only remove; order is preserved. */
export async function applyFilters(
  candidates: readonly VideoCandidate[],
  options: FilterOptions,
  dependencies: FilterDependencies,
): Promise<Result<FilterResult, AppError>> {
  const logger = dependencies.logger ?? createLogger({ baseContext: { module: 'video-filters' } });
  const range = validateFilterOptions(options);
  if (!range.ok) {
    return range;
  }

  const byDate = await filterByDate(candidates, range.value, dependencies.lookupUploadDate);
  const byIndex = filterByIndex(byDate, options.startIndex, options.endIndex);
  const byCount = filterByMaxCount(byIndex, options.maxCount);

  const removed = {
    date: candidates.length - byDate.length,
    index: byDate.length - byIndex.length,
    maxCount: byIndex.length - byCount.length,
  };
  if (removed.date > 0) {
    logger.info('Date filter removed candidates.', { removed: removed.date, remaining: byDate.length });
  }
  if (removed.index > 0) {
    logger.info('Index filter removed candidates.', { removed: removed.index, remaining: byIndex.length });
  }
  if (removed.maxCount > 0) {
    logger.info('Max count filter removed candidates.', { removed: removed.maxCount, remaining: byCount.length });
  }

  return ok({ candidates: byCount, removed });
}
