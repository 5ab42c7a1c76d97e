import type { PersistedSessionState, SessionStateRepository } from '@attention-gw/core';

import {
  DEFAULT_SESSION_KEY_PREFIX,
  DEFAULT_SESSION_TTL_SECONDS,
  type SessionStoreContext,
} from './store';

interface MemoryEntry {
  value: PersistedSessionState;
  expiresAt: number;
}

export interface InMemorySessionStateRepositoryOptions extends SessionStoreContext {
  ttlSeconds?: number;
}

/** Map-backed repository for local development and single-process deployments. */
export class InMemorySessionStateRepository implements SessionStateRepository {
  private readonly records = new Map<string, MemoryEntry>();
  private readonly prefix: string;
  private readonly ttlSeconds: number;

  constructor(options: InMemorySessionStateRepositoryOptions = {}) {
    this.prefix = options.prefix ?? DEFAULT_SESSION_KEY_PREFIX;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
  }

  get size(): number {
    return this.records.size;
  }

  async load(sessionId: string): Promise<PersistedSessionState | undefined> {
    const key = this.namespaced(sessionId);
    const entry = this.records.get(key);

    if (!entry) {
      return undefined;
    }

    if (Date.now() > entry.expiresAt) {
      this.records.delete(key);
      return undefined;
    }

    return { ...entry.value };
  }

  async save(sessionId: string, state: PersistedSessionState): Promise<void> {
    this.records.set(this.namespaced(sessionId), {
      value: { ...state },
      expiresAt: Date.now() + this.ttlSeconds * 1000,
    });
  }

  private namespaced(sessionId: string): string {
    return `${this.prefix}${sessionId}`;
  }
}
