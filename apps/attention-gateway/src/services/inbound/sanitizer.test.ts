import { describe, expect, it } from 'vitest';

import { MessageSanitizer, toInboundMessage, type InboundEvent } from './sanitizer';

function createEvent(overrides: Partial<InboundEvent> = {}): InboundEvent {
  return {
    sessionId: 'group-1',
    messageId: 'mid-1',
    sender: { id: 'user-1', name: 'Ada' },
    text: 'hello there',
    ...overrides,
  };
}

const sanitizer = new MessageSanitizer({
  botId: 'bot-7',
  botNicknames: ['Mai'],
  commandWords: ['Help', 'reset'],
});

describe('MessageSanitizer', () => {
  it('passes ordinary chat through untouched', () => {
    expect(sanitizer.filter(createEvent())).toEqual({
      cleanText: 'hello there',
      isCommand: false,
      wake: false,
      attachmentRefs: [],
    });
  });

  it('drops the bot echoing its own messages', () => {
    expect(sanitizer.filter(createEvent({ sender: { id: 'bot-7' } })).drop).toBe('self');
  });

  it('strips zero-width characters and joins text segments', () => {
    const result = sanitizer.filter(
      createEvent({
        text: '\u200bfirst ',
        segments: [
          { type: 'mention', userId: 'user-9' },
          { type: 'text', text: ' second\u200b' },
        ],
      }),
    );

    expect(result.cleanText).toBe('first second');
  });

  it.each(['/roll 2d6', '!ping', '！签到', 'help me', 'RESET now'])(
    'drops the command %s',
    (text) => {
      const result = sanitizer.filter(createEvent({ text }));

      expect(result.isCommand).toBe(true);
      expect(result.drop).toBe('command');
    },
  );

  it('drops messages with neither text nor attachments', () => {
    expect(sanitizer.filter(createEvent({ text: ' \u200b ' })).drop).toBe('empty');
  });

  it('keeps attachment-only messages and collects their urls', () => {
    const result = sanitizer.filter(
      createEvent({
        text: undefined,
        segments: [
          { type: 'attachment', kind: 'image', url: 'https://cdn.example.com/cat.png' },
          { type: 'attachment', kind: 'audio' },
        ],
      }),
    );

    expect(result.drop).toBeUndefined();
    expect(result.cleanText).toBe('');
    expect(result.attachmentRefs).toEqual(['https://cdn.example.com/cat.png']);
  });

  it('wakes on a mention of the bot', () => {
    const result = sanitizer.filter(
      createEvent({ segments: [{ type: 'mention', userId: 'bot-7' }] }),
    );

    expect(result.wake).toBe(true);
  });

  it('wakes on a nickname regardless of case', () => {
    expect(sanitizer.filter(createEvent({ text: 'what do you think, MAI?' })).wake).toBe(true);
  });

  it('does not treat mentions of other users as a wake signal', () => {
    const result = sanitizer.filter(
      createEvent({ segments: [{ type: 'mention', userId: 'user-2' }] }),
    );

    expect(result.wake).toBe(false);
  });
});

describe('toInboundMessage', () => {
  it('copies the cleaned fields onto the attention message', () => {
    const event = createEvent({ text: 'Mai look' });
    const message = toInboundMessage(event, sanitizer.filter(event), 1_000);

    expect(message).toEqual({
      messageId: 'mid-1',
      sessionId: 'group-1',
      senderId: 'user-1',
      senderName: 'Ada',
      text: 'Mai look',
      attachmentRefs: [],
      arrivalTime: 1_000,
      wake: true,
    });
  });

  it('generates a message id when the bridge sends none', () => {
    const event = createEvent({ messageId: undefined });
    const message = toInboundMessage(event, sanitizer.filter(event));

    expect(message.messageId).toMatch(/^[0-9a-f-]{36}$/);
  });
});
