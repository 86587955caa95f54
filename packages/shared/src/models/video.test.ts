import { describe, expect, it } from 'vitest';
import { ChatMessageSchema } from './chat.ts';
import { VideoCandidateSchema, toLiveStatus } from './video.ts';

describe('model schemas', () => {
  it('accepts a candidate with a compact upload date', () => {
    const parsed = VideoCandidateSchema.safeParse({
      videoId: 'abc123',
      title: 'Sunday stream',
      wasLive: true,
      isLive: false,
      uploadDate: '20240101',
      url: 'https://www.youtube.com/watch?v=abc123',
    });
    expect(parsed.success).toBe(true);
  });

  it('rejects a dashed upload date', () => {
    const parsed = VideoCandidateSchema.safeParse({
      videoId: 'abc123',
      title: 'Sunday stream',
      wasLive: true,
      isLive: false,
      uploadDate: '2024-01-01',
      url: 'https://www.youtube.com/watch?v=abc123',
    });
    expect(parsed.success).toBe(false);
  });

  it('defaults the message type to text_message', () => {
    const message = ChatMessageSchema.parse({ videoId: 'abc123', messageId: 'abc123_0', text: 'hi' });
    expect(message.messageType).toBe('text_message');
  });

  it('maps unknown live statuses to unknown', () => {
    expect(toLiveStatus('was_live')).toBe('was_live');
    expect(toLiveStatus('post_live')).toBe('unknown');
    expect(toLiveStatus(undefined)).toBe('unknown');
  });
});
