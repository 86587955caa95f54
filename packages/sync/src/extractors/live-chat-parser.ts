import { z } from 'zod/v4';
import { UnreadableChatItem } from '../extractor.ts';

const ThumbnailsSchema = z.object({
  thumbnails: z.array(z.object({ url: z.string().optional() })).optional(),
});

const TextSchema = z.object({ simpleText: z.string().optional() });

const EmojiRunSchema = z.object({
  emojiId: z.string().optional(),
  shortcuts: z.array(z.string()).optional(),
  isCustomEmoji: z.boolean().optional(),
  image: ThumbnailsSchema.optional(),
});

const RunSchema = z.object({
  text: z.string().optional(),
  emoji: EmojiRunSchema.optional(),
});

const AuthorBadgeSchema = z.object({
  liveChatAuthorBadgeRenderer: z
    .object({
      tooltip: z.string().optional(),
      customThumbnail: ThumbnailsSchema.optional(),
      icon: z.object({ iconType: z.string().optional() }).optional(),
    })
    .optional(),
});

const MessageRendererSchema = z.object({
  id: z.string().optional(),
  message: z.object({ runs: z.array(RunSchema).optional() }).optional(),
  authorName: TextSchema.optional(),
  authorExternalChannelId: z.string().optional(),
  authorBadges: z.array(AuthorBadgeSchema).optional(),
  timestampUsec: z.string().optional(),
  timestampText: TextSchema.optional(),
  purchaseAmountText: TextSchema.optional(),
});

type MessageRenderer = z.infer<typeof MessageRendererSchema>;

const ReplayLineSchema = z.object({
  replayChatItemAction: z.object({
    actions: z.array(z.unknown()),
  }),
});

const ReplayActionSchema = z.object({
  addChatItemAction: z
    .object({
      item: z.object({
        liveChatTextMessageRenderer: MessageRendererSchema.optional(),
        liveChatPaidMessageRenderer: MessageRendererSchema.optional(),
      }),
    })
    .optional(),
});

function describeIssues(error: { issues: readonly { path: readonly PropertyKey[]; message: string }[] }): string[] {
  return error.issues.map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`);
}

export interface LiveChatEmote {
  id: string;
  name: string;
  images: { url: string }[];
  is_custom_emoji: boolean;
}

/** Chat event in the layout the chat normalizer reads. */
export interface LiveChatEvent {
  message_id?: string;
  author: {
    name?: string;
    id?: string;
    badges?: { title: string; icons: { url: string }[] }[];
  };
  message: string;
  timestamp?: number;
  time_text?: string;
  message_type: string;
  money?: { amount: number; currency: string };
  emotes?: LiveChatEmote[];
}

function lastUrl(thumbnails: z.infer<typeof ThumbnailsSchema> | undefined): string | undefined {
  return (thumbnails?.thumbnails ?? [])
    .map((thumbnail) => thumbnail.url)
    .filter((url): url is string => Boolean(url))
    .at(-1);
}

function renderRuns(renderer: MessageRenderer): { text: string; emotes: LiveChatEmote[] } {
  let text = '';
  const emotes: LiveChatEmote[] = [];
  for (const run of renderer.message?.runs ?? []) {
    if (run.text !== undefined) {
      text += run.text;
      continue;
    }
    const emoji = run.emoji;
    if (!emoji) {
      continue;
    }
    const isCustom = emoji.isCustomEmoji === true;
    const shortcut = emoji.shortcuts?.[0];
    const emojiId = emoji.emojiId ?? '';
    if (isCustom) {
      const name = shortcut ?? `:${emojiId}:`;
      text += name;
      const url = lastUrl(emoji.image);
      emotes.push({
        id: emojiId,
        name,
        images: url === undefined ? [] : [{ url }],
        is_custom_emoji: true,
      });
    } else {
      // Standard emoji carry the character itself as their id.
      text += emojiId;
    }
  }
  return { text, emotes };
}

/** Splits a rendered amount such as `$5.00` or `NT$1,000.00` into currency and value. */
export function parsePurchaseAmount(text: string): { amount: number; currency: string } {
  const match = /^(\D*?)\s*([\d.,]+)\s*(\D*)$/.exec(text.trim());
  if (!match) {
    return { amount: 0, currency: text.trim() };
  }
  const [, prefix = '', digits = '', suffix = ''] = match;
  const amount = Number.parseFloat(digits.replace(/,/g, ''));
  return {
    amount: Number.isFinite(amount) ? amount : 0,
    currency: (prefix || suffix).trim(),
  };
}

function toEvent(renderer: MessageRenderer, messageType: string): LiveChatEvent {
  const { text, emotes } = renderRuns(renderer);
  const badges = (renderer.authorBadges ?? [])
    .map((badge) => badge.liveChatAuthorBadgeRenderer)
    .filter((badge): badge is NonNullable<typeof badge> => badge !== undefined)
    .map((badge) => {
      const url = lastUrl(badge.customThumbnail);
      return {
        title: badge.tooltip ?? badge.icon?.iconType ?? '',
        icons: url === undefined ? [] : [{ url }],
      };
    });
  const timestamp = renderer.timestampUsec === undefined ? Number.NaN : Number(renderer.timestampUsec);
  const amountText = renderer.purchaseAmountText?.simpleText;

  return {
    ...(renderer.id === undefined ? {} : { message_id: renderer.id }),
    author: {
      ...(renderer.authorName?.simpleText === undefined ? {} : { name: renderer.authorName.simpleText }),
      ...(renderer.authorExternalChannelId === undefined ? {} : { id: renderer.authorExternalChannelId }),
      ...(badges.length > 0 ? { badges } : {}),
    },
    message: text,
    ...(Number.isFinite(timestamp) ? { timestamp } : {}),
    ...(renderer.timestampText?.simpleText === undefined ? {} : { time_text: renderer.timestampText.simpleText }),
    message_type: messageType,
    ...(amountText === undefined ? {} : { money: parsePurchaseAmount(amountText) }),
    ...(emotes.length > 0 ? { emotes } : {}),
  };
}

/**
 * Parses one line of a `live_chat.json` replay file. Actions that carry no text or paid
 * message (membership banners, tickers, polls) yield nothing; an action that cannot be read
 * yields an `UnreadableChatItem` without affecting the other actions of the line.
 */
export function parseLiveChatLine(line: string): (LiveChatEvent | UnreadableChatItem)[] {
  const trimmed = line.trim();
  if (trimmed.length === 0) {
    return [];
  }

  let decoded: unknown;
  try {
    decoded = JSON.parse(trimmed);
  } catch (cause) {
    return [new UnreadableChatItem('Replay line is not valid JSON.', [String(cause)])];
  }

  if (typeof decoded !== 'object' || decoded === null || !('replayChatItemAction' in decoded)) {
    return [];
  }
  const envelope = ReplayLineSchema.safeParse(decoded);
  if (!envelope.success) {
    return [new UnreadableChatItem('Replay line has an unexpected shape.', describeIssues(envelope.error))];
  }

  const events: (LiveChatEvent | UnreadableChatItem)[] = [];
  for (const rawAction of envelope.data.replayChatItemAction.actions) {
    const action = ReplayActionSchema.safeParse(rawAction);
    if (!action.success) {
      events.push(new UnreadableChatItem('Replay action has an unexpected shape.', describeIssues(action.error)));
      continue;
    }
    const item = action.data.addChatItemAction?.item;
    if (item?.liveChatTextMessageRenderer) {
      events.push(toEvent(item.liveChatTextMessageRenderer, 'text_message'));
    } else if (item?.liveChatPaidMessageRenderer) {
      events.push(toEvent(item.liveChatPaidMessageRenderer, 'paid_message'));
    }
  }
  return events;
}
