import {
  classifyMessage,
  countEmotes,
  emoteNames,
  emotesToMarkdown,
  formatWithEmotes,
  reconstructMessage,
} from '@chatvault/emotes';
import type { ChatMessage, Emote, VideoDetail } from '@chatvault/shared';
import type { ChalkInstance } from 'chalk';
import { formatUploadDate } from './summary.ts';

export const EMOTE_STYLES = ['text', 'images', 'markdown'] as const;

export type EmoteStyle = (typeof EMOTE_STYLES)[number];

export function isEmoteStyle(value: string): value is EmoteStyle {
  return EMOTE_STYLES.some((style) => style === value);
}

export interface TranscriptOptions {
  limit: number;
  style: EmoteStyle;
}

interface ClassifiedMessage {
  message: ChatMessage;
  unicode: string[];
  custom: Emote[];
}

function renderText(entry: ClassifiedMessage, style: EmoteStyle): string {
  switch (style) {
    case 'text':
      return formatWithEmotes(entry.message.text, entry.custom);
    case 'images':
      return reconstructMessage(entry.message.text, entry.custom);
    case 'markdown':
      return entry.message.text;
  }
}

function renderEmotes(custom: readonly Emote[], style: EmoteStyle): string {
  return style === 'markdown' ? emotesToMarkdown(custom) : emoteNames(custom).join(', ');
}

/** Emote usage by distinct name per message, most used first; ties keep first-seen order. */
function tallyEmoteUsage(entries: readonly ClassifiedMessage[]): [string, number][] {
  const usage = new Map<string, number>();
  for (const entry of entries) {
    for (const name of emoteNames(entry.custom)) {
      usage.set(name, (usage.get(name) ?? 0) + 1);
    }
  }
  return [...usage.entries()].sort((left, right) => right[1] - left[1]);
}

export function formatChatTranscript(
  video: VideoDetail,
  messages: readonly ChatMessage[],
  options: TranscriptOptions,
  colors: ChalkInstance,
): string[] {
  const entries: ClassifiedMessage[] = messages.map((message) => ({
    message,
    ...classifyMessage(message.text, message.emotes ?? null),
  }));
  const customTotal = entries.reduce((total, entry) => total + countEmotes(entry.custom), 0);

  const lines = [
    colors.bold(`${video.videoId}: ${video.title}`),
    `${colors.dim('Uploaded:')} ${formatUploadDate(video.uploadDate)}`,
    `${colors.dim('Messages:')} ${String(entries.length)}`,
    `${colors.dim('With custom emotes:')} ${String(entries.filter((entry) => entry.custom.length > 0).length)}`,
    `${colors.dim('With emoji:')} ${String(entries.filter((entry) => entry.unicode.length > 0).length)}`,
    `${colors.dim('Custom emotes used:')} ${String(customTotal)}`,
  ];

  if (entries.length === 0) {
    return lines;
  }

  lines.push('');
  for (const entry of entries.slice(0, options.limit)) {
    const time = colors.dim(`[${entry.message.timestampText ?? '-'}]`);
    const author = entry.message.authorName ?? 'unknown';
    lines.push(`${time} ${author}: ${renderText(entry, options.style)}`);
    if (entry.custom.length > 0) {
      lines.push(`    ${colors.dim('Emotes:')} ${renderEmotes(entry.custom, options.style)}`);
    }
  }
  if (entries.length > options.limit) {
    lines.push(colors.dim(`... and ${String(entries.length - options.limit)} more`));
  }

  const usage = tallyEmoteUsage(entries);
  if (usage.length > 0) {
    lines.push('', colors.bold('Top emotes'));
    for (const [name, count] of usage.slice(0, 10)) {
      lines.push(`  ${name}: ${String(count)}`);
    }
  }
  return lines;
}
