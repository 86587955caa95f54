import type { ChannelInfo, VideoDetail } from '@chatvault/shared';
import { z } from 'zod/v4';

/** One entry of a channel tab or search listing, before Discovery decides whether to keep it. */
export const PlaylistEntrySchema = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
  url: z.string().optional(),
  duration: z.number().nonnegative().optional(),
  wasLive: z.boolean().optional(),
  isLive: z.boolean().optional(),
  liveStatus: z.string().optional(),
  channelId: z.string().optional(),
  uploadDate: z.string().optional(),
});

export type PlaylistEntry = z.infer<typeof PlaylistEntrySchema>;

export interface FetchOptions {
  signal?: AbortSignal;
}

export interface ListVideosOptions extends FetchOptions {
  maxEntries: number;
}

export interface ListVideosResult {
  candidates: PlaylistEntry[];
  /** False when the page shape did not answer at all, as opposed to answering with no entries. */
  ok: boolean;
}

export interface SearchResult {
  entries: PlaylistEntry[];
}

export interface ExtractorCredentials {
  cookiesFile?: string;
}

export interface ChannelExtractor {
  readonly name: string;
  listVideos: (url: string, options: ListVideosOptions) => Promise<ListVideosResult>;
  search: (query: string, options?: FetchOptions) => Promise<SearchResult>;
  channelInfo: (url: string, options?: FetchOptions) => Promise<ChannelInfo | null>;
  videoDetail: (videoId: string, options?: FetchOptions) => Promise<VideoDetail | null>;
}

/**
 * Stands in for a chat item an extractor received but could not read. The chat normalizer
 * drops it and counts it like any other event that fails conversion.
 */
export class UnreadableChatItem {
  constructor(
    readonly reason: string,
    readonly issues: readonly string[] = [],
  ) {}
}

/**
 * Yields raw chat events for one video. The sequence is finite and cannot be restarted;
 * a fetch-level failure surfaces as a thrown error from the iterator.
 */
export interface ChatExtractor {
  readonly name: string;
  stream: (videoUrl: string, options?: FetchOptions) => AsyncIterable<unknown>;
}

export const YOUTUBE_BASE_URL = 'https://www.youtube.com';

export function toWatchUrl(videoId: string): string {
  return `${YOUTUBE_BASE_URL}/watch?v=${videoId}`;
}

export function videoIdFromUrl(videoUrl: string): string | null {
  try {
    const parsed = new URL(videoUrl);
    const fromQuery = parsed.searchParams.get('v');
    if (fromQuery) {
      return fromQuery;
    }
    if (parsed.hostname === 'youtu.be') {
      const fromPath = parsed.pathname.replace(/^\//, '');
      return fromPath.length > 0 ? fromPath : null;
    }
    return null;
  } catch {
    return null;
  }
}
