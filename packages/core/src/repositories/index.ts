export { createChatRepository, type ChatRepository } from './chat-repository.ts';
export { encodeJsonColumn, decodeJsonColumn, JSON_COLUMN_VERSION, type DecodedJsonColumn } from './json-columns.ts';
export type {
  ArchiveStatsRecord,
  ChatMessageRow,
  InsertFailure,
  InsertMessagesSummary,
  VideoRow,
  VideoSummaryRecord,
} from './types.ts';
