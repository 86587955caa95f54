import { describe, it, expect } from 'vitest';
import { AppError, AppErrorSchema, toError } from './app-error.ts';

describe('AppError', () => {
  describe('create()', () => {
    it('creates an error with default severity', () => {
      const error = AppError.create('SYNC_TEST', 'Test message');
      expect(error.code).toBe('SYNC_TEST');
      expect(error.message).toBe('Test message');
      expect(error.severity).toBe('error');
      expect(error.context).toEqual({});
      expect(error.timestamp).toBeDefined();
    });

    it('creates an error with context', () => {
      const error = AppError.create('DB_ERROR', 'Query failed', 'error', {
        table: 'chat_messages',
        videoId: 'abc123',
      });
      expect(error.context).toEqual({ table: 'chat_messages', videoId: 'abc123' });
    });

    it('preserves cause message', () => {
      const cause = new Error('original error');
      const error = AppError.create('WRAPPED', 'Wrapper', 'error', undefined, cause);
      expect(error.cause).toBe('original error');
    });
  });

  describe('fromCause()', () => {
    it('stringifies non-Error throwables', () => {
      const error = AppError.fromCause('EXPORT_WRITE_FAILED', 'Write failed', { videoId: 'v1' }, 'disk full');
      expect(error.severity).toBe('error');
      expect(error.cause).toBe('disk full');
      expect(error.context).toEqual({ videoId: 'v1' });
    });

    it('keeps Error instances as they are', () => {
      const original = new Error('boom');
      expect(toError(original)).toBe(original);
    });
  });

  describe('withContext()', () => {
    it('merges extra context into a copy', () => {
      const base = AppError.create('SYNC_CHAT_EMPTY', 'No chat', 'warning', { videoId: 'v1' });
      const extended = base.withContext({ stage: 'chat' });
      expect(extended.context).toEqual({ videoId: 'v1', stage: 'chat' });
      expect(extended.severity).toBe('warning');
      expect(base.context).toEqual({ videoId: 'v1' });
    });
  });

  describe('factory methods', () => {
    it('warning() sets severity to warning', () => {
      expect(AppError.warning('SLOW_QUERY', 'Query took >100ms').severity).toBe('warning');
    });

    it('info() sets severity to info', () => {
      expect(AppError.info('NO_VIDEOS', 'Nothing to do').severity).toBe('info');
    });
  });

  describe('toDTO()', () => {
    it('serializes the error with its cause message', () => {
      const error = AppError.fromCause(
        'SYNC_DETAIL_FETCH_FAILED',
        'Fetching video details failed.',
        { videoId: 'v1' },
        new Error('timeout'),
      );
      const dto = error.toDTO();

      expect(dto).toEqual({
        code: 'SYNC_DETAIL_FETCH_FAILED',
        message: 'Fetching video details failed.',
        severity: 'error',
        context: { videoId: 'v1' },
        timestamp: error.timestamp,
        cause: 'timeout',
      });
      expect(AppErrorSchema.safeParse(dto).success).toBe(true);
    });
  });
});
