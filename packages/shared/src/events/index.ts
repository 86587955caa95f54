import { z } from 'zod/v4';
import { AppErrorSchema } from '../errors/app-error.ts';

export const VIDEO_SYNC_STATES = [
  'SKIPPED',
  'EXISTENCE_CHECK_FAILED',
  'DETAIL_FAILED',
  'CHAT_EMPTY',
  'PERSIST_FAILED',
  'PERSISTED',
] as const;

export type VideoSyncState = (typeof VIDEO_SYNC_STATES)[number];

// ─── Sync Events ──────────────────────────────────────────────────

export const VideoProgressEventSchema = z.object({
  channelReference: z.string(),
  videoId: z.string(),
  index: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  state: z.enum(VIDEO_SYNC_STATES),
  messageCount: z.number().int().nonnegative(),
});

export type VideoProgressEvent = z.infer<typeof VideoProgressEventSchema>;

export const VideoErrorEventSchema = z.object({
  channelReference: z.string(),
  videoId: z.string(),
  state: z.enum(VIDEO_SYNC_STATES),
  error: AppErrorSchema,
});

export type VideoErrorEvent = z.infer<typeof VideoErrorEventSchema>;

export const SyncCompleteEventSchema = z.object({
  channelReference: z.string(),
  durationMs: z.number().nonnegative(),
  discovered: z.number().int().nonnegative(),
  filtered: z.number().int().nonnegative(),
  processed: z.number().int().nonnegative(),
  successful: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
  halted: z.boolean(),
  exhausted: z.boolean(),
});

export type SyncCompleteEvent = z.infer<typeof SyncCompleteEventSchema>;
