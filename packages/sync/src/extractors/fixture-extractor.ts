import fs from 'node:fs';
import {
  AppError,
  ChannelInfoSchema,
  VideoDetailSchema,
  err,
  ok,
  toError,
  type Result,
} from '@chatvault/shared';
import { z } from 'zod/v4';
import {
  PlaylistEntrySchema,
  videoIdFromUrl,
  type ChannelExtractor,
  type ChatExtractor,
} from '../extractor.ts';

export const ExtractorFixtureSchema = z.object({
  /** Channel page URL → channel info. */
  channels: z.record(z.string(), ChannelInfoSchema).default({}),
  /** Channel tab URL → listing. A URL that is absent does not answer. */
  pages: z.record(z.string(), z.array(PlaylistEntrySchema)).default({}),
  /** Search query → results. */
  searches: z.record(z.string(), z.array(PlaylistEntrySchema)).default({}),
  videos: z.array(VideoDetailSchema).default([]),
  /** Video id → raw chat events. */
  chats: z.record(z.string(), z.array(z.unknown())).default({}),
  /** Video ids whose chat fetch fails outright. */
  chatFailures: z.array(z.string()).default([]),
});

export type ExtractorFixture = z.output<typeof ExtractorFixtureSchema>;
export type ExtractorFixtureInput = z.input<typeof ExtractorFixtureSchema>;

export type FixtureExtractor = ChannelExtractor & ChatExtractor;

export function parseExtractorFixture(value: unknown, source = 'inline'): Result<ExtractorFixture, AppError> {
  const parsed = ExtractorFixtureSchema.safeParse(value);
  if (!parsed.success) {
    return err(
      AppError.create('EXTRACTOR_FIXTURE_INVALID', 'Extractor fixture has an invalid shape.', 'error', {
        source,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
  }
  return ok(parsed.data);
}

export function loadExtractorFixtureFromFile(filePath: string): Result<ExtractorFixture, AppError> {
  let decoded: unknown;
  try {
    decoded = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (cause) {
    return err(
      AppError.create(
        'EXTRACTOR_FIXTURE_READ_FAILED',
        'Could not read the extractor fixture.',
        'error',
        { filePath },
        toError(cause),
      ),
    );
  }
  return parseExtractorFixture(decoded, filePath);
}

/** Serves channel pages, searches, video details and chat replays from a fixture. */
export function createFixtureExtractor(fixture: ExtractorFixture): FixtureExtractor {
  const videosById = new Map(fixture.videos.map((video) => [video.videoId, video]));
  const failingChats = new Set(fixture.chatFailures);

  async function* streamChat(videoUrl: string, signal: AbortSignal | undefined): AsyncGenerator<unknown> {
    const videoId = videoIdFromUrl(videoUrl);
    if (videoId === null) {
      throw new Error(`Not a video URL: ${videoUrl}`);
    }
    if (failingChats.has(videoId)) {
      throw new Error(`Chat replay unavailable for ${videoId}.`);
    }
    for (const event of fixture.chats[videoId] ?? []) {
      signal?.throwIfAborted();
      yield event;
    }
  }

  return {
    name: 'fixture',

    listVideos: async (url, options) => {
      options.signal?.throwIfAborted();
      const entries = fixture.pages[url];
      if (entries === undefined) {
        return { candidates: [], ok: false };
      }
      return { candidates: entries.slice(0, options.maxEntries), ok: true };
    },

    search: async (query, options = {}) => {
      options.signal?.throwIfAborted();
      return { entries: fixture.searches[query] ?? [] };
    },

    channelInfo: async (url, options = {}) => {
      options.signal?.throwIfAborted();
      return fixture.channels[url] ?? null;
    },

    videoDetail: async (videoId, options = {}) => {
      options.signal?.throwIfAborted();
      return videosById.get(videoId) ?? null;
    },

    stream: (videoUrl, options = {}) => streamChat(videoUrl, options.signal),
  };
}
