import { createLogger, type ChannelInfo, type Logger, type VideoCandidate } from '@chatvault/shared';
import {
  YOUTUBE_BASE_URL,
  toWatchUrl,
  type ChannelExtractor,
  type ListVideosResult,
  type PlaylistEntry,
} from './extractor.ts';

export const DEFAULT_MAX_ENTRIES = 100_000;

const TAB_TITLE_KEYWORDS = ['直播', 'live', 'stream'];
const SEARCH_TITLE_KEYWORDS = ['直播', 'live', 'stream', '실시간', 'ライブ'];

type ChannelTab = 'streams' | 'videos';

export interface ChannelShape {
  url: string;
  tab: ChannelTab;
}

export interface DiscoveryContext {
  reference: string;
  extractor: ChannelExtractor;
  maxEntries: number;
  logger: Logger;
}

export interface DiscoveryStrategy {
  readonly name: string;
  run: (context: DiscoveryContext) => Promise<VideoCandidate[]>;
}

export interface DiscoverOptions {
  /** Result of an earlier `resolveChannel`; skips the channel info lookups. `null` means nothing resolved. */
  channel?: ChannelInfo | null;
}

export interface Discovery {
  discover: (channelReference: string, options?: DiscoverOptions) => Promise<VideoCandidate[]>;
  resolveChannel: (channelReference: string) => Promise<ChannelInfo | null>;
}

export interface CreateDiscoveryInput {
  extractor: ChannelExtractor;
  logger?: Logger;
  maxEntries?: number;
}

const CHANNEL_URL_PATTERNS: ReadonlyArray<RegExp> = [
  /youtube\.com\/channel\/([^/?#]+)/i,
  /youtube\.com\/@([^/?#]+)/i,
  /youtube\.com\/c\/([^/?#]+)/i,
  /youtube\.com\/user\/([^/?#]+)/i,
];

/**
 * Reduces a handle, id or channel URL to the bare reference used to build page URLs.
 */
export function normalizeChannelReference(channelReference: string): string {
  const trimmed = channelReference.trim();
  for (const pattern of CHANNEL_URL_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match?.[1]) {
      return decodeURIComponent(match[1]).replace(/^@+|@+$/g, '').trim();
    }
  }
  return trimmed.replace(/^@+|@+$/g, '').trim();
}

export function isCanonicalChannelId(reference: string): boolean {
  return reference.startsWith('UC');
}

export function buildChannelInfoUrls(reference: string): string[] {
  const urls = [
    `${YOUTUBE_BASE_URL}/@${reference}`,
    `${YOUTUBE_BASE_URL}/c/${reference}`,
    `${YOUTUBE_BASE_URL}/user/${reference}`,
  ];
  if (isCanonicalChannelId(reference)) {
    urls.unshift(`${YOUTUBE_BASE_URL}/channel/${reference}`);
  }
  return urls;
}

function tabsFor(base: string): ChannelShape[] {
  return [
    { url: `${base}/streams`, tab: 'streams' },
    { url: `${base}/videos`, tab: 'videos' },
  ];
}

export function buildChannelShapes(reference: string, resolvedChannelId: string | null): ChannelShape[] {
  const shapes: ChannelShape[] = [];
  if (resolvedChannelId) {
    shapes.push(...tabsFor(`${YOUTUBE_BASE_URL}/channel/${resolvedChannelId}`));
  }

  if (isCanonicalChannelId(reference)) {
    shapes.push(...tabsFor(`${YOUTUBE_BASE_URL}/channel/${reference}`));
  } else {
    shapes.push(
      ...tabsFor(`${YOUTUBE_BASE_URL}/@${reference}`),
      ...tabsFor(`${YOUTUBE_BASE_URL}/c/${reference}`),
      ...tabsFor(`${YOUTUBE_BASE_URL}/user/${reference}`),
    );
  }

  const seen = new Set<string>();
  return shapes.filter((shape) => {
    if (seen.has(shape.url)) {
      return false;
    }
    seen.add(shape.url);
    return true;
  });
}

export function buildSearchQueries(reference: string): string[] {
  return [
    `ytsearch30:${reference} 直播`,
    `ytsearch30:${reference} live stream`,
    `ytsearch30:${reference} 실시간`,
    `ytsearch20:site:youtube.com ${reference} live`,
  ];
}

function titleHasKeyword(title: string, keywords: readonly string[]): boolean {
  const lowered = title.toLowerCase();
  return keywords.some((keyword) => lowered.includes(keyword));
}

function isFlaggedLive(entry: PlaylistEntry): boolean {
  return (
    entry.wasLive === true ||
    entry.isLive === true ||
    entry.liveStatus === 'was_live' ||
    entry.liveStatus === 'is_live'
  );
}

function toCandidate(entry: PlaylistEntry & { id: string }, overrides: Partial<VideoCandidate> = {}): VideoCandidate {
  return {
    videoId: entry.id,
    title: entry.title ?? '',
    url: toWatchUrl(entry.id),
    wasLive: entry.wasLive === true || entry.liveStatus === 'was_live',
    isLive: entry.isLive === true || entry.liveStatus === 'is_live',
    ...(entry.duration === undefined ? {} : { duration: entry.duration }),
    ...(entry.channelId === undefined ? {} : { channelId: entry.channelId }),
    ...(entry.uploadDate && /^\d{8}$/.test(entry.uploadDate) ? { uploadDate: entry.uploadDate } : {}),
    ...overrides,
  };
}

function hasId(entry: PlaylistEntry): entry is PlaylistEntry & { id: string } {
  return typeof entry.id === 'string' && entry.id.length > 0;
}

export function dedupeCandidates(candidates: readonly VideoCandidate[]): VideoCandidate[] {
  const seen = new Set<string>();
  const unique: VideoCandidate[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.videoId)) {
      continue;
    }
    seen.add(candidate.videoId);
    unique.push(candidate);
  }
  return unique;
}

export function createChannelTabStrategy(shape: ChannelShape): DiscoveryStrategy {
  return {
    name: `channel-tab:${shape.url}`,
    run: async (context) => {
      let listing: ListVideosResult;
      try {
        listing = await context.extractor.listVideos(shape.url, { maxEntries: context.maxEntries });
      } catch (cause) {
        context.logger.debug('Channel page lookup failed.', { url: shape.url, cause: String(cause) });
        return [];
      }
      if (!listing.ok) {
        context.logger.debug('Channel page did not answer.', { url: shape.url });
        return [];
      }

      return listing.candidates
        .filter(hasId)
        .filter(
          (entry) =>
            shape.tab === 'streams' ||
            isFlaggedLive(entry) ||
            titleHasKeyword(entry.title ?? '', TAB_TITLE_KEYWORDS),
        )
        .map((entry) => toCandidate(entry));
    },
  };
}

export function createSearchStrategy(): DiscoveryStrategy {
  return {
    name: 'search',
    run: async (context) => {
      const found: VideoCandidate[] = [];
      for (const query of buildSearchQueries(context.reference)) {
        try {
          const result = await context.extractor.search(query);
          for (const entry of result.entries) {
            if (hasId(entry) && titleHasKeyword(entry.title ?? '', SEARCH_TITLE_KEYWORDS)) {
              found.push(toCandidate(entry, { wasLive: true }));
            }
          }
        } catch (cause) {
          context.logger.debug('Search query failed.', { query, cause: String(cause) });
        }
      }
      return dedupeCandidates(found);
    },
  };
}

export function createDiscovery(input: CreateDiscoveryInput): Discovery {
  const logger = input.logger ?? createLogger({ baseContext: { module: 'discovery' } });
  const maxEntries = input.maxEntries ?? DEFAULT_MAX_ENTRIES;

  const resolveChannel = async (channelReference: string): Promise<ChannelInfo | null> => {
    const reference = normalizeChannelReference(channelReference);
    if (reference.length === 0) {
      return null;
    }
    for (const url of buildChannelInfoUrls(reference)) {
      try {
        const info = await input.extractor.channelInfo(url);
        if (info) {
          return info;
        }
      } catch (cause) {
        logger.debug('Channel info lookup failed.', { url, cause: String(cause) });
      }
    }
    logger.warning('Could not resolve channel info.', { channelReference });
    return null;
  };

  return {
    resolveChannel,
    discover: async (channelReference, options = {}) => {
      const reference = normalizeChannelReference(channelReference);
      if (reference.length === 0) {
        logger.warning('Empty channel reference, nothing to discover.', { channelReference });
        return [];
      }

      const channel = options.channel === undefined ? await resolveChannel(reference) : options.channel;
      const resolvedChannelId = channel && channel.channelId.length > 0 ? channel.channelId : null;

      const strategies: DiscoveryStrategy[] = [
        ...buildChannelShapes(reference, resolvedChannelId).map(createChannelTabStrategy),
        createSearchStrategy(),
      ];
      const context: DiscoveryContext = { reference, extractor: input.extractor, maxEntries, logger };

      for (const strategy of strategies) {
        const candidates = dedupeCandidates(await strategy.run(context));
        if (candidates.length > 0) {
          logger.info('Discovered livestream candidates.', {
            channelReference,
            strategy: strategy.name,
            count: candidates.length,
          });
          return candidates;
        }
      }

      logger.warning('No livestream candidates found.', { channelReference });
      return [];
    },
  };
}
