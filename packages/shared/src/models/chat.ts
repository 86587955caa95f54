import { z } from 'zod/v4';

export const DEFAULT_MESSAGE_TYPE = 'text_message';

export const EmoteSchema = z.object({
  name: z.string().min(1),
  id: z.string(),
  url: z.string().optional(),
  isCustom: z.boolean(),
});

export type Emote = z.infer<typeof EmoteSchema>;

export const BadgeSchema = z.object({
  title: z.string(),
  id: z.string().optional(),
  iconUrl: z.string().optional(),
});

export type Badge = z.infer<typeof BadgeSchema>;

export const ChatMessageSchema = z.object({
  videoId: z.string().min(1),
  messageId: z.string().min(1),
  authorName: z.string().optional(),
  authorId: z.string().optional(),
  text: z.string(),
  timestampUsec: z.number().int().optional(),
  timestampText: z.string().optional(),
  messageType: z.string().default(DEFAULT_MESSAGE_TYPE),
  superchatAmount: z.number().optional(),
  superchatCurrency: z.string().optional(),
  badges: z.array(BadgeSchema).optional(),
  emotes: z.array(EmoteSchema).optional(),
});

export type ChatMessage = z.output<typeof ChatMessageSchema>;
