import { createReadStream } from 'node:fs';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createInterface } from 'node:readline';
import {
  createLogger,
  toLiveStatus,
  type ChannelInfo,
  type Logger,
  type VideoDetail,
} from '@chatvault/shared';
import { z } from 'zod/v4';
import {
  toWatchUrl,
  type ChannelExtractor,
  type ChatExtractor,
  type ExtractorCredentials,
  type FetchOptions,
  type PlaylistEntry,
} from '../extractor.ts';
import { parseJsonLines, spawnCommandRunner, type CommandRunner } from './command-runner.ts';
import { parseLiveChatLine } from './live-chat-parser.ts';

const FlatEntrySchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  duration: z.number().nullish(),
  was_live: z.boolean().nullish(),
  is_live: z.boolean().nullish(),
  live_status: z.string().nullish(),
  channel_id: z.string().nullish(),
  upload_date: z.string().nullish(),
});

const ChannelPageSchema = z.object({
  id: z.string().nullish(),
  channel_id: z.string().nullish(),
  channel: z.string().nullish(),
  uploader: z.string().nullish(),
  channel_url: z.string().nullish(),
  webpage_url: z.string().nullish(),
  channel_follower_count: z.number().nullish(),
});

const count = z.number().nullish();

export const VideoInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  upload_date: z.string().nullish(),
  duration: z.number().nullish(),
  view_count: count,
  like_count: count,
  comment_count: count,
  channel_id: z.string().nullish(),
  channel: z.string().nullish(),
  description: z.string().nullish(),
  is_live: z.boolean().nullish(),
  was_live: z.boolean().nullish(),
  live_status: z.string().nullish(),
  release_timestamp: z.number().nullish(),
  timestamp: z.number().nullish(),
  thumbnail: z.string().nullish(),
  thumbnails: z.array(z.object({ url: z.string().nullish() })).nullish(),
  categories: z.array(z.string()).nullish(),
  tags: z.array(z.string()).nullish(),
  availability: z.string().nullish(),
  uploader: z.string().nullish(),
  uploader_id: z.string().nullish(),
});

export type VideoInfo = z.infer<typeof VideoInfoSchema>;

export interface CreateYtDlpExtractorInput extends ExtractorCredentials {
  binaryPath?: string;
  runner?: CommandRunner;
  logger?: Logger;
  /** Directory under which per-video chat downloads are staged. */
  workDir?: string;
}

export type YtDlpExtractor = ChannelExtractor & ChatExtractor;

function orUndefined<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function toPlaylistEntry(raw: z.infer<typeof FlatEntrySchema>): PlaylistEntry {
  return {
    id: orUndefined(raw.id),
    title: orUndefined(raw.title),
    url: orUndefined(raw.url),
    duration: orUndefined(raw.duration),
    wasLive: orUndefined(raw.was_live),
    isLive: orUndefined(raw.is_live),
    liveStatus: orUndefined(raw.live_status),
    channelId: orUndefined(raw.channel_id),
    uploadDate: orUndefined(raw.upload_date),
  };
}

function nonNegativeInt(value: number | null | undefined): number | null {
  if (value === null || value === undefined || !Number.isFinite(value) || value < 0) {
    return null;
  }
  return Math.trunc(value);
}

function pickThumbnail(info: VideoInfo): string | null {
  const fromList = (info.thumbnails ?? []).at(-1)?.url;
  if (fromList) {
    return fromList;
  }
  return info.thumbnail ?? null;
}

/** Maps `yt-dlp --dump-json` output for one video onto a VideoDetail. */
export function toVideoDetail(info: VideoInfo, videoId: string): VideoDetail {
  const liveStatus = toLiveStatus(info.live_status);
  const startedAt = info.release_timestamp ?? info.timestamp ?? null;
  const uploadDate = info.upload_date && /^\d{8}$/.test(info.upload_date) ? info.upload_date : '';
  const duration = nonNegativeInt(info.duration);

  return {
    videoId,
    title: info.title ?? '',
    url: toWatchUrl(videoId),
    uploadDate,
    ...(duration === null ? {} : { duration }),
    ...(info.channel_id ? { channelId: info.channel_id } : {}),
    wasLive: info.was_live === true || liveStatus === 'was_live',
    isLive: info.is_live === true || liveStatus === 'is_live',
    viewCount: nonNegativeInt(info.view_count),
    likeCount: nonNegativeInt(info.like_count),
    commentCount: nonNegativeInt(info.comment_count),
    liveStartTimestamp: startedAt,
    liveEndTimestamp: null,
    releaseTimestamp: startedAt,
    thumbnailUrl: pickThumbnail(info),
    categories: info.categories ?? [],
    tags: info.tags ?? [],
    channelName: info.channel ?? null,
    description: info.description ?? null,
    uploader: info.uploader ?? null,
    uploaderId: info.uploader_id ?? null,
    availability: info.availability ?? null,
    liveStatus,
  };
}

export function createYtDlpExtractor(input: CreateYtDlpExtractorInput = {}): YtDlpExtractor {
  const binaryPath = input.binaryPath ?? 'yt-dlp';
  const runner = input.runner ?? spawnCommandRunner;
  const logger = input.logger ?? createLogger({ baseContext: { module: 'ytdlp-extractor' } });
  const workDir = input.workDir ?? tmpdir();
  const baseArgs = ['--no-warnings', ...(input.cookiesFile ? ['--cookies', input.cookiesFile] : [])];

  const run = async (args: readonly string[], options: FetchOptions = {}) => {
    const result = await runner(binaryPath, [...baseArgs, ...args], options);
    if (result.exitCode !== 0) {
      logger.debug('yt-dlp exited with a non-zero code.', {
        exitCode: result.exitCode,
        stderr: result.stderr.trim().slice(0, 500),
      });
    }
    return result;
  };

  const listFlat = async (target: string, args: readonly string[], options: FetchOptions) => {
    const result = await run(['--flat-playlist', '--dump-json', '--ignore-errors', ...args, target], options);
    const lines = parseJsonLines(result.stdout);
    if (lines.invalidLines > 0) {
      logger.warning('Skipped unreadable yt-dlp output lines.', { target, invalidLines: lines.invalidLines });
    }
    const entries: PlaylistEntry[] = [];
    for (const value of lines.values) {
      const parsed = FlatEntrySchema.safeParse(value);
      if (parsed.success) {
        entries.push(toPlaylistEntry(parsed.data));
      }
    }
    return { entries, answered: result.exitCode === 0 || entries.length > 0 };
  };

  async function* streamChat(videoUrl: string, options: FetchOptions): AsyncGenerator<unknown> {
    const stagingDir = await mkdtemp(join(workDir, 'chatvault-chat-'));
    try {
      const result = await run(
        [
          '--skip-download',
          '--write-subs',
          '--sub-langs',
          'live_chat',
          '--paths',
          stagingDir,
          '--output',
          '%(id)s.%(ext)s',
          videoUrl,
        ],
        options,
      );

      const chatFile = (await readdir(stagingDir)).find((name) => name.endsWith('.live_chat.json'));
      if (chatFile === undefined) {
        if (result.exitCode !== 0) {
          throw new Error(`yt-dlp could not fetch the chat replay (exit code ${String(result.exitCode)}).`);
        }
        return;
      }

      const lines = createInterface({ input: createReadStream(join(stagingDir, chatFile), 'utf8'), crlfDelay: Infinity });
      for await (const line of lines) {
        for (const event of parseLiveChatLine(line)) {
          yield event;
        }
      }
    } finally {
      await rm(stagingDir, { recursive: true, force: true });
    }
  }

  return {
    name: 'yt-dlp',

    listVideos: async (url, options) => {
      const listing = await listFlat(url, ['--playlist-end', String(options.maxEntries)], options);
      return { candidates: listing.entries, ok: listing.answered };
    },

    search: async (query, options = {}) => {
      const listing = await listFlat(query, [], options);
      return { entries: listing.entries };
    },

    channelInfo: async (url, options = {}) => {
      const result = await run(['--flat-playlist', '--dump-single-json', '--playlist-items', '0', url], options);
      const [first] = parseJsonLines(result.stdout).values;
      const parsed = ChannelPageSchema.safeParse(first);
      if (result.exitCode !== 0 || !parsed.success) {
        return null;
      }
      const page = parsed.data;
      const info: ChannelInfo = {
        channelId: page.channel_id ?? page.id ?? '',
        name: page.channel ?? page.uploader ?? null,
        url: page.channel_url ?? page.webpage_url ?? url,
        subscriberCount: nonNegativeInt(page.channel_follower_count),
      };
      return info;
    },

    videoDetail: async (videoId, options = {}) => {
      const result = await run(['--dump-json', '--skip-download', toWatchUrl(videoId)], options);
      const [first] = parseJsonLines(result.stdout).values;
      const parsed = VideoInfoSchema.safeParse(first);
      if (!parsed.success) {
        logger.debug('No usable video metadata.', { videoId, exitCode: result.exitCode });
        return null;
      }
      return toVideoDetail(parsed.data, videoId);
    },

    stream: (videoUrl, options = {}) => streamChat(videoUrl, options),
  };
}
