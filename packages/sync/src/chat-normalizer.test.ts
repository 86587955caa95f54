import { createLogger, type LogEntry } from '@chatvault/shared';
import { describe, expect, it } from 'vitest';
import { normalizeChatEvent, normalizeChatStream } from './chat-normalizer.ts';
import { UnreadableChatItem } from './extractor.ts';
import { parseLiveChatLine } from './extractors/live-chat-parser.ts';

async function* fromArray(events: unknown[]): AsyncGenerator<unknown> {
  for (const event of events) {
    yield event;
  }
}

describe('normalizeChatEvent', () => {
  it('maps a paid message with badges and emotes', () => {
    const result = normalizeChatEvent(
      {
        message_id: 'm1',
        author: {
          name: 'supporter',
          id: 'UCsupporter',
          badges: [{ title: 'Member', id: 7, icons: [{ url: 'https://img.test/16.png' }, { url: 'https://img.test/32.png' }] }],
        },
        message: 'thanks :heart:',
        timestamp: 1704103260000000.7,
        time_text: '1:00',
        message_type: 'paid_message',
        money: { amount: 4.99, currency: '€' },
        emotes: [{ name: ':heart:', emoji_id: 'h1', image: { url: 'https://img.test/heart.png' } }],
      },
      'abc123',
      0,
    );

    expect(result).toEqual({
      ok: true,
      value: {
        videoId: 'abc123',
        messageId: 'm1',
        text: 'thanks :heart:',
        messageType: 'paid_message',
        authorName: 'supporter',
        authorId: 'UCsupporter',
        timestampUsec: 1704103260000000,
        timestampText: '1:00',
        superchatAmount: 4.99,
        superchatCurrency: '€',
        badges: [{ title: 'Member', id: '7', iconUrl: 'https://img.test/32.png' }],
        emotes: [{ name: 'heart', id: 'h1', url: 'https://img.test/heart.png', isCustom: true }],
      },
    });
  });

  it('fills the id, type and text when the event lacks them', () => {
    const result = normalizeChatEvent({ author: { name: '' }, message: null, money: {} }, 'abc123', 4);

    expect(result).toEqual({
      ok: true,
      value: {
        videoId: 'abc123',
        messageId: 'abc123_4',
        text: '',
        messageType: 'text_message',
        superchatAmount: 0,
      },
    });
  });

  it('rejects events of the wrong shape', () => {
    const result = normalizeChatEvent({ message: 42 }, 'abc123', 0);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('SYNC_CHAT_EVENT_INVALID');
    expect(result.error.severity).toBe('warning');
  });

  it('rejects items the extractor could not read', () => {
    const result = normalizeChatEvent(new UnreadableChatItem('Replay line is not valid JSON.', ['bad token']), 'abc123', 3);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('SYNC_CHAT_EVENT_UNREADABLE');
    expect(result.error.message).toBe('Replay line is not valid JSON.');
    expect(result.error.context).toEqual({ videoId: 'abc123', ordinal: 3, issues: ['bad token'] });
  });
});

describe('normalizeChatStream', () => {
  it('drops unconvertible events and numbers fallback ids by converted count', async () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ writer: (entry) => entries.push(entry) });

    const normalized = await normalizeChatStream(
      fromArray([{ message: 'first' }, 'garbage', { message: 'second' }]),
      'abc123',
      logger,
    );

    expect(normalized.dropped).toBe(1);
    expect(normalized.messages.map((message) => [message.messageId, message.text])).toEqual([
      ['abc123_0', 'first'],
      ['abc123_1', 'second'],
    ]);
    expect(entries.map((entry) => [entry.level, entry.message])).toEqual([
      ['warning', 'Dropped chat event that could not be converted.'],
    ]);
  });

  it('counts a malformed replay action as dropped and keeps its neighbours', async () => {
    const entries: LogEntry[] = [];
    const logger = createLogger({ writer: (entry) => entries.push(entry) });
    const line = JSON.stringify({
      replayChatItemAction: {
        actions: [
          { addChatItemAction: { item: { liveChatTextMessageRenderer: { id: 'ok-1', timestampUsec: '1700000000000000' } } } },
          { addChatItemAction: { item: { liveChatTextMessageRenderer: { id: 'bad-1', timestampUsec: 1700000000000000 } } } },
        ],
      },
    });

    const normalized = await normalizeChatStream(fromArray(parseLiveChatLine(line)), 'abc123', logger);

    expect(normalized.dropped).toBe(1);
    expect(normalized.messages.map((message) => [message.messageId, message.timestampUsec])).toEqual([
      ['ok-1', 1700000000000000],
    ]);
    expect(entries.map((entry) => [entry.level, entry.message])).toEqual([
      ['warning', 'Dropped chat event that could not be converted.'],
    ]);
  });

  it('propagates a failing stream', async () => {
    async function* failing(): AsyncGenerator<unknown> {
      yield { message: 'only one' };
      throw new Error('connection reset');
    }

    await expect(normalizeChatStream(failing(), 'abc123', createLogger({ writer: () => undefined }))).rejects.toThrow(
      'connection reset',
    );
  });
});
