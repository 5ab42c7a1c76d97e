import { randomUUID } from 'node:crypto';

import type { InboundMessage } from '@attention-gw/core';

export type AttachmentKind = 'image' | 'video' | 'audio' | 'file';

export type InboundSegment =
  | { type: 'text'; text: string }
  | { type: 'mention'; userId: string }
  | { type: 'attachment'; kind: AttachmentKind; url?: string };

/** A chat event as posted by the platform bridge, before any cleaning. */
export interface InboundEvent {
  sessionId: string;
  messageId?: string;
  sender: { id: string; name?: string };
  text?: string;
  segments?: InboundSegment[];
}

export type DropReason = 'self' | 'command' | 'empty';

export interface SanitizedEvent {
  cleanText: string;
  isCommand: boolean;
  wake: boolean;
  attachmentRefs: string[];
  drop?: DropReason;
}

export interface MessageSanitizerOptions {
  botId?: string;
  botNicknames?: string[];
  commandWords?: string[];
}

const ZERO_WIDTH = /[\u200B-\u200D\u2060\uFEFF]/g;
const COMMAND_PREFIXES = ['/', '!', '！'];

/**
 * Cleans platform events into attention input. Commands, empty messages and
 * the bot's own echoes never reach admission.
 */
export class MessageSanitizer {
  private readonly nicknames: string[];
  private readonly commandWords: Set<string>;

  constructor(private readonly options: MessageSanitizerOptions = {}) {
    this.nicknames = normaliseList(options.botNicknames);
    this.commandWords = new Set(normaliseList(options.commandWords));
  }

  filter(event: InboundEvent): SanitizedEvent {
    const segments = event.segments ?? [];
    const textParts = [event.text ?? '', ...segments.map(segmentText)]
      .map((part) => part.replace(ZERO_WIDTH, '').trim())
      .filter((part) => part.length > 0);
    const cleanText = textParts.join(' ');
    const attachmentRefs = segments.flatMap((segment) =>
      segment.type === 'attachment' && segment.url ? [segment.url] : [],
    );
    const hasPayload = segments.some((segment) => segment.type === 'attachment');

    const result: SanitizedEvent = {
      cleanText,
      isCommand: this.isCommand(cleanText),
      wake: false,
      attachmentRefs,
    };

    if (this.options.botId && event.sender.id === this.options.botId) {
      return { ...result, drop: 'self' };
    }

    if (result.isCommand) {
      return { ...result, drop: 'command' };
    }

    if (!cleanText && !hasPayload) {
      return { ...result, drop: 'empty' };
    }

    return { ...result, wake: this.isWake(cleanText, segments) };
  }

  isCommand(text: string): boolean {
    if (!text) {
      return false;
    }

    if (COMMAND_PREFIXES.some((prefix) => text.startsWith(prefix))) {
      return true;
    }

    const firstWord = text.split(/\s+/)[0]?.toLowerCase() ?? '';
    return this.commandWords.has(firstWord);
  }

  private isWake(cleanText: string, segments: InboundSegment[]): boolean {
    const botId = this.options.botId;
    if (botId && segments.some((segment) => segment.type === 'mention' && segment.userId === botId)) {
      return true;
    }

    const lowered = cleanText.toLowerCase();
    return this.nicknames.some((nickname) => lowered.includes(nickname));
  }
}

/** Build the immutable attention message for an event that survived `filter`. */
export function toInboundMessage(
  event: InboundEvent,
  sanitized: SanitizedEvent,
  arrivalTime: number = Date.now(),
): InboundMessage {
  return {
    messageId: event.messageId ?? randomUUID(),
    sessionId: event.sessionId,
    senderId: event.sender.id,
    senderName: event.sender.name,
    text: sanitized.cleanText,
    attachmentRefs: sanitized.attachmentRefs,
    arrivalTime,
    wake: sanitized.wake,
  };
}

function segmentText(segment: InboundSegment): string {
  return segment.type === 'text' ? segment.text : '';
}

function normaliseList(values: string[] = []): string[] {
  return values.map((value) => value.trim().toLowerCase()).filter((value) => value.length > 0);
}
