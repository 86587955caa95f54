import type { Emote } from '@chatvault/shared';
import { z } from 'zod/v4';

// Emoticons, pictographs, transport, regional flags, dingbats, supplemental and
// extended symbol blocks. Nothing below U+2702 and no CJK block is included.
const UNICODE_EMOJI_RUN =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{2702}-\u{27B0}\u{1F900}-\u{1F9FF}\u{1FA00}-\u{1FA6F}\u{1FA70}-\u{1FAFF}]+/gu;

// `:name:` where name starts with a letter, so timestamps like 1:30 do not match.
const CUSTOM_EMOTE_TOKEN = /:([a-zA-Z][a-zA-Z0-9_-]*):/g;

const RawEmoteSchema = z.object({
  name: z.string().optional(),
  id: z.string().optional(),
  emoji_id: z.string().optional(),
  url: z.string().optional(),
  image: z.object({ url: z.string().optional() }).optional(),
  images: z.array(z.object({ url: z.string().optional() })).optional(),
  is_custom_emoji: z.boolean().optional(),
  isCustom: z.boolean().optional(),
});

type RawEmote = z.infer<typeof RawEmoteSchema>;

export interface EmoteClassification {
  unicode: string[];
  custom: Emote[];
}

export function extractUnicodeEmojis(text: string): string[] {
  return text.match(UNICODE_EMOJI_RUN) ?? [];
}

export function hasUnicodeEmojis(text: string): boolean {
  return extractUnicodeEmojis(text).length > 0;
}

export function findCustomEmoteNames(text: string): string[] {
  return Array.from(text.matchAll(CUSTOM_EMOTE_TOKEN), (match) => match[1] ?? '').filter(
    (name) => name.length > 0,
  );
}

export function hasCustomEmoji(text: string): boolean {
  return findCustomEmoteNames(text).length > 0;
}

function stripColons(name: string): string {
  return name.replace(/^:+|:+$/g, '');
}

function lastImageUrl(raw: RawEmote): string | undefined {
  const urls = (raw.images ?? [])
    .map((image) => image.url)
    .filter((url): url is string => url !== undefined && url.length > 0);
  return urls.at(-1);
}

function toEmote(raw: RawEmote): Emote | null {
  const name = stripColons(raw.name ?? '');
  if (name.length === 0) {
    return null;
  }

  const url = raw.url ?? raw.image?.url ?? lastImageUrl(raw);
  return {
    name,
    id: raw.id ?? raw.emoji_id ?? '',
    ...(url !== undefined && url.length > 0 ? { url } : {}),
    isCustom: raw.is_custom_emoji ?? raw.isCustom ?? true,
  };
}

function decodePayload(payload: unknown): unknown {
  if (typeof payload !== 'string') {
    return payload;
  }
  if (payload.trim().length === 0) {
    return [];
  }
  try {
    const decoded: unknown = JSON.parse(payload);
    return decoded;
  } catch {
    return [];
  }
}

/**
 * Normalizes an emote list as delivered by the chat source (or its JSON text) into
 * `Emote` values. Anything that is not a list yields `[]`; malformed entries and
 * entries without a name are dropped individually.
 */
export function parseEmotePayload(payload: unknown): Emote[] {
  const decoded = decodePayload(payload);
  if (!Array.isArray(decoded)) {
    return [];
  }

  const emotes: Emote[] = [];
  for (const item of decoded) {
    const parsed = RawEmoteSchema.safeParse(item);
    if (!parsed.success) {
      continue;
    }
    const emote = toEmote(parsed.data);
    if (emote) {
      emotes.push(emote);
    }
  }
  return emotes;
}

export function classifyMessage(text: string, payload?: unknown): EmoteClassification {
  const custom =
    payload === undefined || payload === null
      ? findCustomEmoteNames(text).map((name) => ({ name, id: '', isCustom: true }))
      : parseEmotePayload(payload);

  return {
    unicode: extractUnicodeEmojis(text),
    custom,
  };
}

function replaceTokens(text: string, emotes: readonly Emote[], render: (name: string) => string): string {
  let result = text;
  for (const emote of emotes) {
    if (emote.name.length > 0) {
      result = result.split(`:${emote.name}:`).join(render(emote.name));
    }
  }
  return result;
}

export function formatWithEmotes(text: string, emotes: readonly Emote[]): string {
  return replaceTokens(text, emotes, (name) => `[Emoji: ${name}]`);
}

export function reconstructMessage(text: string, emotes: readonly Emote[]): string {
  return replaceTokens(text, emotes, (name) => `[IMG:${name}]`);
}

export function emotesToMarkdown(emotes: readonly Emote[]): string {
  return emotes
    .map((emote) => (emote.url ? `![${emote.name}](${emote.url})` : `:${emote.name}:`))
    .join(' ');
}

export function countEmotes(emotes: readonly Emote[]): number {
  return emotes.length;
}

export function emoteNames(emotes: readonly Emote[]): string[] {
  return [...new Set(emotes.map((emote) => emote.name).filter((name) => name.length > 0))];
}
