import { createLogger, type VideoCandidate } from '@chatvault/shared';
import { describe, expect, it } from 'vitest';
import {
  applyFilters,
  filterByDate,
  filterByIndex,
  filterByMaxCount,
  parseUploadDate,
  validateDateRange,
  validateFilterOptions,
} from './video-filters.ts';

const silentLogger = createLogger({ writer: () => undefined });

function candidate(videoId: string, uploadDate?: string): VideoCandidate {
  return {
    videoId,
    title: videoId,
    url: `https://www.youtube.com/watch?v=${videoId}`,
    wasLive: true,
    isLive: false,
    ...(uploadDate === undefined ? {} : { uploadDate }),
  };
}

const ids = (candidates: readonly VideoCandidate[]) => candidates.map((item) => item.videoId);
const noLookup = async () => null;

describe('parseUploadDate', () => {
  it('accepts real compact dates only', () => {
    expect(parseUploadDate('20240229')).toBe('20240229');
    expect(parseUploadDate('20230229')).toBeNull();
    expect(parseUploadDate('2024-02-01')).toBeNull();
    expect(parseUploadDate('')).toBeNull();
    expect(parseUploadDate(undefined)).toBeNull();
  });
});

describe('validateDateRange', () => {
  it('converts ISO bounds to the compact form', () => {
    expect(validateDateRange({ startDate: '2024-01-01', endDate: '2024-12-31' })).toEqual({
      ok: true,
      value: { start: '20240101', end: '20241231' },
    });
    expect(validateDateRange({ startDate: ' ' })).toEqual({ ok: true, value: { start: null, end: null } });
  });

  it('rejects malformed bounds', () => {
    const result = validateDateRange({ endDate: '2024/01/01' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('SYNC_INVALID_INPUT');
    expect(result.error.context).toEqual({ endDate: '2024/01/01' });
  });
});

describe('validateFilterOptions', () => {
  it('rejects fractional indices and negative counts', () => {
    const fractional = validateFilterOptions({ startIndex: 1.5 });
    expect(fractional.ok).toBe(false);
    if (!fractional.ok) {
      expect(fractional.error.message).toBe('startIndex must be an integer.');
    }

    const negative = validateFilterOptions({ maxCount: -1 });
    expect(negative.ok).toBe(false);
    if (!negative.ok) {
      expect(negative.error.message).toBe('maxCount must be a non-negative integer.');
    }
  });
});

describe('filterByDate', () => {
  it('keeps in-range items and items without a determinable date', async () => {
    const candidates = [
      candidate('early', '20231231'),
      candidate('start', '20240101'),
      candidate('unknown'),
      candidate('end', '20240131'),
      candidate('late', '20240201'),
    ];

    const kept = await filterByDate(candidates, { start: '20240101', end: '20240131' }, noLookup);

    expect(ids(kept)).toEqual(['start', 'unknown', 'end']);
  });

  it('attaches looked-up dates before comparing', async () => {
    const looked: string[] = [];
    const lookup = async (item: VideoCandidate) => {
      looked.push(item.videoId);
      return item.videoId === 'in' ? '20240115' : '20230101';
    };

    const kept = await filterByDate([candidate('in'), candidate('out'), candidate('dated', '20240110')], {
      start: '20240101',
      end: null,
    }, lookup);

    expect(looked).toEqual(['in', 'out']);
    expect(kept.map((item) => [item.videoId, item.uploadDate])).toEqual([
      ['in', '20240115'],
      ['dated', '20240110'],
    ]);
  });

  it('returns an empty list for an inverted range', async () => {
    const kept = await filterByDate([candidate('a', '20240115')], { start: '20240201', end: '20240101' }, noLookup);

    expect(kept).toEqual([]);
  });

  it('does not look anything up without bounds', async () => {
    const lookup = async (): Promise<string | null> => {
      throw new Error('unexpected lookup');
    };

    await expect(filterByDate([candidate('a')], { start: null, end: null }, lookup)).resolves.toHaveLength(1);
  });
});

describe('filterByIndex', () => {
  const list = ['a', 'b', 'c', 'd', 'e'].map((id) => candidate(id));

  it('matches Array.prototype.slice', () => {
    expect(ids(filterByIndex(list, 1, 3))).toEqual(['b', 'c']);
    expect(ids(filterByIndex(list, 3))).toEqual(['d', 'e']);
    expect(ids(filterByIndex(list, -2))).toEqual(['d', 'e']);
    expect(ids(filterByIndex(list, 0, -1))).toEqual(['a', 'b', 'c', 'd']);
    expect(ids(filterByIndex(list, 4, 2))).toEqual([]);
  });
});

describe('filterByMaxCount', () => {
  const list = ['a', 'b', 'c'].map((id) => candidate(id));

  it('treats zero and absence as unlimited', () => {
    expect(ids(filterByMaxCount(list, 2))).toEqual(['a', 'b']);
    expect(ids(filterByMaxCount(list, 0))).toEqual(['a', 'b', 'c']);
    expect(ids(filterByMaxCount(list))).toEqual(['a', 'b', 'c']);
  });
});

describe('applyFilters', () => {
  it('applies date, index and count in order', async () => {
    const candidates = [
      candidate('v6', '20240601'),
      candidate('v5', '20240501'),
      candidate('v4', '20240401'),
      candidate('v3', '20240301'),
      candidate('v2', '20240201'),
      candidate('v1', '20240101'),
    ];

    const result = await applyFilters(
      candidates,
      { startDate: '2024-02-01', endDate: '2024-05-31', startIndex: 1, maxCount: 2 },
      { lookupUploadDate: noLookup, logger: silentLogger },
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(ids(result.value.candidates)).toEqual(['v4', 'v3']);
    expect(result.value.removed).toEqual({ date: 2, index: 1, maxCount: 1 });
  });

  it('rejects invalid options', async () => {
    const result = await applyFilters([], { startDate: 'yesterday' }, { lookupUploadDate: noLookup, logger: silentLogger });

    expect(result.ok).toBe(false);
  });
});
