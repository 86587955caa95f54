import { parseEmotePayload } from '@chatvault/emotes';
import {
  AppError,
  DEFAULT_MESSAGE_TYPE,
  createLogger,
  err,
  ok,
  type Badge,
  type ChatMessage,
  type Logger,
  type Result,
} from '@chatvault/shared';
import { z } from 'zod/v4';
import { UnreadableChatItem } from './extractor.ts';

const RawBadgeSchema = z.object({
  title: z.string(),
  id: z.union([z.string(), z.number()]).optional(),
  badge_id: z.union([z.string(), z.number()]).optional(),
  icons: z.array(z.object({ url: z.string().optional() })).optional(),
});

/** Chat event as produced by the chat extractors: the chat-downloader item layout. */
export const RawChatEventSchema = z.object({
  message_id: z.string().optional(),
  author: z
    .object({
      name: z.string().optional(),
      id: z.string().optional(),
      badges: z.array(RawBadgeSchema).optional(),
    })
    .optional(),
  message: z.string().nullable().optional(),
  timestamp: z.number().optional(),
  time_text: z.string().optional(),
  message_type: z.string().optional(),
  money: z
    .object({
      amount: z.number().optional(),
      currency: z.string().optional(),
    })
    .optional(),
  emotes: z.unknown().optional(),
});

export type RawChatEvent = z.infer<typeof RawChatEventSchema>;

export interface NormalizedChat {
  messages: ChatMessage[];
  dropped: number;
}

function toBadge(raw: z.infer<typeof RawBadgeSchema>): Badge {
  const id = raw.id ?? raw.badge_id;
  const iconUrl = (raw.icons ?? []).map((icon) => icon.url).filter((url): url is string => Boolean(url)).at(-1);
  return {
    title: raw.title,
    ...(id === undefined ? {} : { id: String(id) }),
    ...(iconUrl === undefined ? {} : { iconUrl }),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.length > 0 ? value : undefined;
}

/**
 * Converts one raw chat event. `ordinal` is the number of messages already converted for
 * the video and provides the fallback id `{videoId}_{ordinal}`.
 */
export function normalizeChatEvent(raw: unknown, videoId: string, ordinal: number): Result<ChatMessage, AppError> {
  if (raw instanceof UnreadableChatItem) {
    return err(
      AppError.create('SYNC_CHAT_EVENT_UNREADABLE', raw.reason, 'warning', {
        videoId,
        ordinal,
        issues: [...raw.issues],
      }),
    );
  }

  const parsed = RawChatEventSchema.safeParse(raw);
  if (!parsed.success) {
    return err(
      AppError.create('SYNC_CHAT_EVENT_INVALID', 'Chat event has an unexpected shape.', 'warning', {
        videoId,
        ordinal,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
  }

  const event = parsed.data;
  const badges = (event.author?.badges ?? []).map(toBadge);
  const emotes = parseEmotePayload(event.emotes);
  const authorName = nonEmpty(event.author?.name);
  const authorId = nonEmpty(event.author?.id);
  const timestampText = nonEmpty(event.time_text);

  return ok({
    videoId,
    messageId: nonEmpty(event.message_id) ?? `${videoId}_${String(ordinal)}`,
    text: event.message ?? '',
    messageType: nonEmpty(event.message_type) ?? DEFAULT_MESSAGE_TYPE,
    ...(authorName === undefined ? {} : { authorName }),
    ...(authorId === undefined ? {} : { authorId }),
    ...(event.timestamp === undefined ? {} : { timestampUsec: Math.trunc(event.timestamp) }),
    ...(timestampText === undefined ? {} : { timestampText }),
    ...(event.money === undefined
      ? {}
      : {
          superchatAmount: event.money.amount ?? 0,
          ...(event.money.currency === undefined ? {} : { superchatCurrency: event.money.currency }),
        }),
    ...(badges.length > 0 ? { badges } : {}),
    ...(emotes.length > 0 ? { emotes } : {}),
  });
}

/**
 * Drains a chat stream. Events that fail conversion are logged and dropped; a failure of
 * the stream itself propagates to the caller.
 */
export async function normalizeChatStream(
  events: AsyncIterable<unknown>,
  videoId: string,
  logger: Logger = createLogger({ baseContext: { module: 'chat-normalizer' } }),
): Promise<NormalizedChat> {
  const messages: ChatMessage[] = [];
  let dropped = 0;

  for await (const raw of events) {
    const message = normalizeChatEvent(raw, videoId, messages.length);
    if (!message.ok) {
      dropped += 1;
      logger.warning('Dropped chat event that could not be converted.', message.error.context);
      continue;
    }
    messages.push(message.value);
  }

  return { messages, dropped };
}
