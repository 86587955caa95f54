import type { InsertMessagesSummary } from '@chatvault/core';
import {
  AppError,
  DEFAULT_VIDEO_DELAY_MS,
  createLogger,
  err,
  ok,
  stageFailed,
  stageOk,
  stageSkipped,
  type ChatMessage,
  type Logger,
  type Result,
  type StageOutcome,
  type SyncCompleteEvent,
  type VideoCandidate,
  type VideoDetail,
  type VideoErrorEvent,
  type VideoProgressEvent,
  type VideoSyncState,
} from '@chatvault/shared';
import { normalizeChatStream, type NormalizedChat } from './chat-normalizer.ts';
import type { Discovery } from './discovery.ts';
import type { ChannelExtractor, ChatExtractor } from './extractor.ts';
import type { DatabaseSink } from './sinks/database-sink.ts';
import type { JsonExportSink } from './sinks/json-export-sink.ts';
import { applyFilters, validateFilterOptions, type FilterOptions } from './video-filters.ts';

export interface SyncOptions extends FilterOptions {
  /** Default true. */
  skipExisting?: boolean;
  /** Default true. Halts the run at the first candidate that is already stored. */
  stopOnExisting?: boolean;
  /** Default false. */
  saveToDatabase?: boolean;
}

export interface VideoOutcome {
  videoId: string;
  title: string;
  state: VideoSyncState;
  messageCount: number;
  droppedMessages: number;
  exportPath: string | null;
  database: InsertMessagesSummary | null;
  /** Why the video failed or was skipped. */
  error: AppError | null;
  /** Set when the export succeeded but the database step did not. */
  databaseError: AppError | null;
}

export interface SyncReport {
  channelReference: string;
  discovered: number;
  filtered: number;
  processed: number;
  successful: number;
  failed: number;
  skipped: number;
  halted: boolean;
  exhausted: boolean;
  outcomes: VideoOutcome[];
}

export interface SyncTally {
  processed: number;
  successful: number;
  failed: number;
  skipped: number;
}

export interface CreateSyncControllerInput {
  discovery: Discovery;
  channelExtractor: ChannelExtractor;
  chatExtractor: ChatExtractor;
  exportSink: JsonExportSink;
  /** Enables the existence check and, with `saveToDatabase`, the relational sink. */
  store?: DatabaseSink;
  logger?: Logger;
  now?: () => Date;
  sleep?: (delayMs: number) => Promise<void>;
  videoDelayMs?: number;
  /** Abandons one upload-date lookup, or the detail and chat fetch of one video, after this long. */
  fetchTimeoutMs?: number | null;
  hooks?: {
    onProgress?: (event: VideoProgressEvent) => void;
    onVideoError?: (event: VideoErrorEvent) => void;
    onComplete?: (event: SyncCompleteEvent) => void;
  };
}

export interface SyncController {
  syncChannel: (channelReference: string, options?: SyncOptions) => Promise<Result<SyncReport, AppError>>;
  isRunning: () => boolean;
}

type VideoStageOutcome = StageOutcome<VideoOutcome, VideoOutcome>;

export const EMPTY_TALLY: SyncTally = { processed: 0, successful: 0, failed: 0, skipped: 0 };

export function tallyOutcome(tally: SyncTally, outcome: StageOutcome<unknown, unknown>): SyncTally {
  switch (outcome.kind) {
    case 'ok':
      return { ...tally, processed: tally.processed + 1, successful: tally.successful + 1 };
    case 'failed':
      return { ...tally, processed: tally.processed + 1, failed: tally.failed + 1 };
    case 'skipped':
      return { ...tally, processed: tally.processed + 1, skipped: tally.skipped + 1 };
  }
}

function defaultSleep(delayMs: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, delayMs);
  });
}

function createOutcome(candidate: VideoCandidate, state: VideoSyncState, error: AppError | null): VideoOutcome {
  return {
    videoId: candidate.videoId,
    title: candidate.title,
    state,
    messageCount: 0,
    droppedMessages: 0,
    exportPath: null,
    database: null,
    error,
    databaseError: null,
  };
}

function outcomeOf(stage: VideoStageOutcome, fallback: VideoOutcome): VideoOutcome {
  switch (stage.kind) {
    case 'ok':
      return stage.value;
    case 'failed':
      return stage.error;
    case 'skipped':
      return fallback;
  }
}

interface FetchWindow {
  signal: AbortSignal | undefined;
  timedOut: () => boolean;
  dispose: () => void;
}

function openFetchWindow(timeoutMs: number | null): FetchWindow {
  if (timeoutMs === null || timeoutMs <= 0) {
    return { signal: undefined, timedOut: () => false, dispose: () => undefined };
  }
  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Fetch exceeded ${String(timeoutMs)} ms.`));
  }, timeoutMs);
  return {
    signal: controller.signal,
    timedOut: () => controller.signal.aborted,
    dispose: () => {
      clearTimeout(timer);
    },
  };
}

/** Settles with the fetch, or rejects once the signal aborts, whichever comes first. */
function untilAborted<T>(fetch: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return fetch;
  }
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(signal.reason);
    };
    signal.addEventListener('abort', onAbort, { once: true });
    void fetch.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (cause: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(cause);
      },
    );
  });
}

export function createSyncController(input: CreateSyncControllerInput): SyncController {
  const logger = input.logger ?? createLogger({ baseContext: { module: 'sync-controller' } });
  const now = input.now ?? (() => new Date());
  const sleep = input.sleep ?? defaultSleep;
  const videoDelayMs = input.videoDelayMs ?? DEFAULT_VIDEO_DELAY_MS;
  const fetchTimeoutMs = input.fetchTimeoutMs ?? null;

  let activeChannel: string | null = null;

  const emitVideoError = (channelReference: string, outcome: VideoOutcome, error: AppError): void => {
    input.hooks?.onVideoError?.({
      channelReference,
      videoId: outcome.videoId,
      state: outcome.state,
      error: error.toDTO(),
    });
  };

  const fetchDetail = async (
    videoId: string,
    cache: Map<string, VideoDetail>,
    signal?: AbortSignal,
  ): Promise<Result<VideoDetail | null, AppError>> => {
    const cached = cache.get(videoId);
    if (cached) {
      return ok(cached);
    }
    try {
      const detail = await untilAborted(input.channelExtractor.videoDetail(videoId, signal ? { signal } : {}), signal);
      if (detail) {
        cache.set(videoId, detail);
      }
      return ok(detail);
    } catch (cause) {
      return err(AppError.fromCause('SYNC_DETAIL_FETCH_FAILED', 'Fetching video details failed.', { videoId }, cause));
    }
  };

  const writeExport = async (
    videoId: string,
    detail: VideoDetail,
    messages: readonly ChatMessage[],
  ): Promise<Result<string, AppError>> => {
    try {
      return await input.exportSink.write(videoId, detail, messages);
    } catch (cause) {
      return err(AppError.fromCause('EXPORT_WRITE_FAILED', 'Writing the JSON export failed.', { videoId }, cause));
    }
  };

  const persistMessages = (
    store: DatabaseSink,
    detail: VideoDetail,
    messages: readonly ChatMessage[],
  ): Result<InsertMessagesSummary, AppError> => {
    try {
      return store.persist(detail, messages);
    } catch (cause) {
      return err(
        AppError.fromCause('DB_PERSIST_FAILED', 'Persisting the video failed.', { videoId: detail.videoId }, cause),
      );
    }
  };

  const processVideo = async (
    candidate: VideoCandidate,
    options: Required<Pick<SyncOptions, 'skipExisting' | 'stopOnExisting' | 'saveToDatabase'>>,
    detailCache: Map<string, VideoDetail>,
  ): Promise<VideoStageOutcome> => {
    const videoId = candidate.videoId;
    const store = input.store;

    if (store && (options.skipExisting || options.stopOnExisting)) {
      const exists = store.existsForVideo(videoId);
      if (!exists.ok) {
        return stageFailed(
          'existence check failed',
          createOutcome(candidate, 'EXISTENCE_CHECK_FAILED', exists.error),
        );
      }
      if (exists.value) {
        return stageSkipped('already synchronized');
      }
    }

    const window = openFetchWindow(fetchTimeoutMs);
    const timeoutError = (stage: string): AppError =>
      AppError.create('SYNC_VIDEO_TIMEOUT', 'Fetching the video timed out.', 'error', {
        videoId,
        stage,
        timeoutMs: fetchTimeoutMs,
      });

    let detail: VideoDetail;
    let messages: NormalizedChat;
    try {
      const detailResult = await fetchDetail(videoId, detailCache, window.signal);
      if (!detailResult.ok || detailResult.value === null) {
        const error = window.timedOut()
          ? timeoutError('detail')
          : detailResult.ok
            ? AppError.create('SYNC_DETAIL_UNAVAILABLE', 'Video details are unavailable.', 'error', { videoId })
            : detailResult.error;
        return stageFailed('detail unavailable', createOutcome(candidate, 'DETAIL_FAILED', error));
      }
      detail = detailResult.value;

      try {
        messages = await normalizeChatStream(
          input.chatExtractor.stream(candidate.url, window.signal ? { signal: window.signal } : {}),
          videoId,
          logger.withContext({ videoId }),
        );
      } catch (cause) {
        const error = window.timedOut()
          ? timeoutError('chat')
          : AppError.fromCause('SYNC_CHAT_FETCH_FAILED', 'Fetching the chat replay failed.', { videoId }, cause);
        return stageFailed('chat unavailable', createOutcome(candidate, 'CHAT_EMPTY', error));
      }
    } finally {
      window.dispose();
    }

    if (messages.messages.length === 0) {
      return stageFailed(
        'chat empty',
        createOutcome(
          candidate,
          'CHAT_EMPTY',
          AppError.create('SYNC_CHAT_EMPTY', 'The video has no chat replay messages.', 'warning', {
            videoId,
            dropped: messages.dropped,
          }),
        ),
      );
    }

    const exportResult = await writeExport(videoId, detail, messages.messages);
    const databaseResult = options.saveToDatabase && store ? persistMessages(store, detail, messages.messages) : null;

    const outcome: VideoOutcome = {
      videoId,
      title: detail.title || candidate.title,
      state: exportResult.ok ? 'PERSISTED' : 'PERSIST_FAILED',
      messageCount: messages.messages.length,
      droppedMessages: messages.dropped,
      exportPath: exportResult.ok ? exportResult.value : null,
      database: databaseResult?.ok ? databaseResult.value : null,
      error: exportResult.ok ? null : exportResult.error,
      databaseError: databaseResult && !databaseResult.ok ? databaseResult.error : null,
    };

    return exportResult.ok ? stageOk(outcome) : stageFailed('export failed', outcome);
  };

  const runSync = async (channelReference: string, options: SyncOptions): Promise<Result<SyncReport, AppError>> => {
    const startedAt = now();
    const flags = {
      skipExisting: options.skipExisting ?? true,
      stopOnExisting: options.stopOnExisting ?? true,
      saveToDatabase: options.saveToDatabase ?? false,
    };
    const runLogger = logger.withContext({ channelReference });
    const detailCache = new Map<string, VideoDetail>();

    const discovered = await input.discovery.discover(channelReference);
    const report: SyncReport = {
      channelReference,
      discovered: discovered.length,
      filtered: 0,
      ...EMPTY_TALLY,
      halted: false,
      exhausted: false,
      outcomes: [],
    };

    const finish = (): Result<SyncReport, AppError> => {
      input.hooks?.onComplete?.({
        channelReference,
        durationMs: Math.max(0, now().getTime() - startedAt.getTime()),
        discovered: report.discovered,
        filtered: report.filtered,
        processed: report.processed,
        successful: report.successful,
        failed: report.failed,
        skipped: report.skipped,
        halted: report.halted,
        exhausted: report.exhausted,
      });
      runLogger.info('Channel sync finished.', {
        processed: report.processed,
        successful: report.successful,
        failed: report.failed,
        skipped: report.skipped,
        halted: report.halted,
      });
      return ok(report);
    };

    if (discovered.length === 0) {
      runLogger.warning('No videos found for channel.');
      report.exhausted = true;
      return finish();
    }

    const filtered = await applyFilters(discovered, options, {
      logger: runLogger,
      lookupUploadDate: async (candidate) => {
        const window = openFetchWindow(fetchTimeoutMs);
        try {
          const detail = await fetchDetail(candidate.videoId, detailCache, window.signal);
          if (!detail.ok) {
            runLogger.warning(
              window.timedOut()
                ? 'Upload date lookup timed out, keeping candidate.'
                : 'Upload date lookup failed, keeping candidate.',
              { videoId: candidate.videoId },
            );
            return null;
          }
          return detail.value?.uploadDate || null;
        } finally {
          window.dispose();
        }
      },
    });
    if (!filtered.ok) {
      return filtered;
    }

    const candidates = filtered.value.candidates;
    report.filtered = candidates.length;
    runLogger.info('Processing candidates.', { discovered: discovered.length, filtered: candidates.length });

    for (const [index, candidate] of candidates.entries()) {
      const stage = await processVideo(candidate, flags, detailCache);
      let tally: SyncTally = {
        processed: report.processed,
        successful: report.successful,
        failed: report.failed,
        skipped: report.skipped,
      };
      tally = tallyOutcome(tally, stage);
      Object.assign(report, tally);

      const outcome = outcomeOf(
        stage,
        createOutcome(
          candidate,
          'SKIPPED',
          AppError.info('SYNC_VIDEO_ALREADY_SYNCED', 'Video already has stored messages.', {
            videoId: candidate.videoId,
          }),
        ),
      );
      report.outcomes.push(outcome);

      input.hooks?.onProgress?.({
        channelReference,
        videoId: outcome.videoId,
        index,
        total: candidates.length,
        state: outcome.state,
        messageCount: outcome.messageCount,
      });

      if (stage.kind === 'skipped') {
        if (flags.stopOnExisting) {
          runLogger.info('Reached an already synchronized video, stopping.', { videoId: candidate.videoId });
          report.halted = true;
          break;
        }
        runLogger.info('Skipping already synchronized video.', { videoId: candidate.videoId });
        continue;
      }

      if (stage.kind === 'failed' && outcome.error) {
        runLogger.warning('Video sync failed.', { videoId: outcome.videoId, state: outcome.state, code: outcome.error.code });
        emitVideoError(channelReference, outcome, outcome.error);
      } else {
        runLogger.info('Video synchronized.', {
          videoId: outcome.videoId,
          messages: outcome.messageCount,
          exportPath: outcome.exportPath,
        });
      }
      if (outcome.databaseError) {
        runLogger.error('Database persistence failed, export kept.', {
          videoId: outcome.videoId,
          code: outcome.databaseError.code,
        });
        emitVideoError(channelReference, outcome, outcome.databaseError);
      }

      if (videoDelayMs > 0) {
        await sleep(videoDelayMs);
      }
    }

    return finish();
  };

  return {
    isRunning: () => activeChannel !== null,

    syncChannel: async (channelReference, options = {}) => {
      if (activeChannel !== null) {
        return err(
          AppError.create('SYNC_ALREADY_RUNNING', 'A channel sync is already running.', 'error', {
            activeChannel,
            requestedChannel: channelReference,
          }),
        );
      }

      const validation = validateFilterOptions(options);
      if (!validation.ok) {
        return validation;
      }

      activeChannel = channelReference;
      try {
        return await runSync(channelReference, options);
      } finally {
        activeChannel = null;
      }
    },
  };
}
