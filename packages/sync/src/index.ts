// Extractor contracts
export {
  PlaylistEntrySchema,
  YOUTUBE_BASE_URL,
  toWatchUrl,
  UnreadableChatItem,
  videoIdFromUrl,
  type ChannelExtractor,
  type ChatExtractor,
  type ExtractorCredentials,
  type FetchOptions,
  type ListVideosOptions,
  type ListVideosResult,
  type PlaylistEntry,
  type SearchResult,
} from './extractor.ts';

// Extractors
export {
  createFixtureExtractor,
  ExtractorFixtureSchema,
  loadExtractorFixtureFromFile,
  parseExtractorFixture,
  type ExtractorFixture,
  type ExtractorFixtureInput,
  type FixtureExtractor,
} from './extractors/fixture-extractor.ts';
export {
  createYtDlpExtractor,
  toVideoDetail,
  VideoInfoSchema,
  type CreateYtDlpExtractorInput,
  type VideoInfo,
  type YtDlpExtractor,
} from './extractors/ytdlp-extractor.ts';
export {
  parseJsonLines,
  spawnCommandRunner,
  type CommandResult,
  type CommandRunner,
  type JsonLines,
  type RunCommandOptions,
} from './extractors/command-runner.ts';
export {
  parseLiveChatLine,
  parsePurchaseAmount,
  type LiveChatEmote,
  type LiveChatEvent,
} from './extractors/live-chat-parser.ts';

// Discovery and filtering
export {
  buildChannelInfoUrls,
  buildChannelShapes,
  buildSearchQueries,
  createChannelTabStrategy,
  createDiscovery,
  createSearchStrategy,
  dedupeCandidates,
  DEFAULT_MAX_ENTRIES,
  isCanonicalChannelId,
  normalizeChannelReference,
  type ChannelShape,
  type CreateDiscoveryInput,
  type DiscoverOptions,
  type Discovery,
  type DiscoveryContext,
  type DiscoveryStrategy,
} from './discovery.ts';
export {
  applyFilters,
  filterByDate,
  filterByIndex,
  filterByMaxCount,
  parseUploadDate,
  validateDateRange,
  validateFilterOptions,
  type CompactDateRange,
  type DateRangeInput,
  type FilterDependencies,
  type FilterOptions,
  type FilterResult,
} from './video-filters.ts';

// Chat
export {
  normalizeChatEvent,
  normalizeChatStream,
  RawChatEventSchema,
  type NormalizedChat,
  type RawChatEvent,
} from './chat-normalizer.ts';

// Sinks
export {
  buildExportFile,
  createJsonExportSink,
  exportFileName,
  toLocalCompactDate,
  type CreateJsonExportSinkInput,
  type JsonExportSink,
} from './sinks/json-export-sink.ts';
export {
  createDatabaseSink,
  type CreateDatabaseSinkInput,
  type DatabaseSink,
} from './sinks/database-sink.ts';
export {
  ExportChatMessageSchema,
  ExportFileSchema,
  ExportVideoInfoSchema,
  fromExportChatMessage,
  fromExportVideoInfo,
  toExportChatMessage,
  toExportVideoInfo,
  type ExportChatMessage,
  type ExportFile,
  type ExportVideoInfo,
} from './sinks/export-format.ts';

// Sync and import
export {
  createSyncController,
  EMPTY_TALLY,
  tallyOutcome,
  type CreateSyncControllerInput,
  type SyncController,
  type SyncOptions,
  type SyncReport,
  type SyncTally,
  type VideoOutcome,
} from './sync-controller.ts';
export {
  importExportFile,
  parseExportFile,
  readExportFile,
  replayExport,
  type ImportReplayOptions,
  type ImportReplaySummary,
} from './import-replay.ts';
