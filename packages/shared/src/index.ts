// Types
export {
  type Result,
  type Ok,
  type Err,
  ok,
  err,
} from './types/result.ts';
export {
  type StageOutcome,
  type StageOk,
  type StageSkipped,
  type StageFailed,
  stageOk,
  stageSkipped,
  stageFailed,
} from './types/outcome.ts';

// Errors
export {
  AppError,
  AppErrorSchema,
  SEVERITY,
  toError,
  type Severity,
  type AppErrorDTO,
} from './errors/app-error.ts';

// Models
export {
  LIVE_STATUSES,
  type LiveStatus,
  UploadDateSchema,
  VideoCandidateSchema,
  type VideoCandidate,
  VideoDetailSchema,
  type VideoDetail,
  ChannelInfoSchema,
  type ChannelInfo,
  toLiveStatus,
} from './models/video.ts';
export {
  DEFAULT_MESSAGE_TYPE,
  EmoteSchema,
  type Emote,
  BadgeSchema,
  type Badge,
  ChatMessageSchema,
  type ChatMessage,
} from './models/chat.ts';

// Events
export {
  VIDEO_SYNC_STATES,
  type VideoSyncState,
  type VideoProgressEvent,
  VideoProgressEventSchema,
  type VideoErrorEvent,
  VideoErrorEventSchema,
  type SyncCompleteEvent,
  SyncCompleteEventSchema,
} from './events/index.ts';

// Config
export {
  loadConfig,
  type AppConfig,
  DEFAULT_DB_PATH,
  DEFAULT_JSON_DIR,
  DEFAULT_YTDLP_PATH,
  DEFAULT_VIDEO_DELAY_MS,
} from './config/index.ts';

// Logger
export {
  createLogger,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LogContext,
  type LogWriter,
  type Clock,
  type CreateLoggerOptions,
} from './logger/index.ts';
