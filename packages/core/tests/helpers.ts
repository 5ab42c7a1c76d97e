import { vi } from 'vitest';

import type {
  InboundMessage,
  PersistedSessionState,
  SessionStateRepository,
} from '../src/attention/types';
import type { LoggerLike } from '../src/logger';

let messageCounter = 0;

export function createMessage(overrides: Partial<InboundMessage> = {}): InboundMessage {
  messageCounter += 1;
  return {
    messageId: `msg-${messageCounter}`,
    sessionId: 'session-1',
    senderId: 'user-x',
    text: 'hello there',
    attachmentRefs: [],
    arrivalTime: Date.now(),
    wake: false,
    ...overrides,
  };
}

export function createLoggerStub(): Required<LoggerLike> {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** Map-backed repository that records every save. */
export class FakeRepository implements SessionStateRepository {
  readonly saved = new Map<string, PersistedSessionState>();
  readonly load = vi.fn(async (sessionId: string) => {
    const state = this.saved.get(sessionId);
    return state ? { ...state } : undefined;
  });
  readonly save = vi.fn(async (sessionId: string, state: PersistedSessionState) => {
    this.saved.set(sessionId, { ...state });
  });
}
