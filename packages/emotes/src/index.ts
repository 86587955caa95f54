export {
  extractUnicodeEmojis,
  hasUnicodeEmojis,
  findCustomEmoteNames,
  hasCustomEmoji,
  parseEmotePayload,
  classifyMessage,
  formatWithEmotes,
  reconstructMessage,
  emotesToMarkdown,
  countEmotes,
  emoteNames,
  type EmoteClassification,
} from './emote-classifier.ts';
