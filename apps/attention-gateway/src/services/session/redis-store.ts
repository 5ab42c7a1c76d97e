import {
  CorruptSessionStateError,
  StoreUnavailableError,
  type PersistedSessionState,
  type SessionStateRepository,
} from '@attention-gw/core';
import { Redis } from 'ioredis';

import {
  DEFAULT_SESSION_KEY_PREFIX,
  DEFAULT_SESSION_TTL_SECONDS,
  parsePersistedSessionState,
  type SessionStoreContext,
} from './store';

/** Subset of the ioredis client the repository talks to. */
export type RedisLike = Pick<Redis, 'get' | 'set' | 'connect' | 'quit' | 'status'>;

export interface RedisSessionStateRepositoryOptions extends SessionStoreContext {
  url?: string;
  client?: RedisLike;
  ttlSeconds?: number;
}

/**
 * Session state persisted as one JSON string per session with a sliding
 * expiry. Client failures surface as `StoreUnavailableError`; a record
 * that no longer parses surfaces as `CorruptSessionStateError`.
 */
export class RedisSessionStateRepository implements SessionStateRepository {
  private readonly redis: RedisLike;
  private readonly prefix: string;
  private readonly ttlSeconds: number;
  private readonly ownsClient: boolean;

  constructor(options: RedisSessionStateRepositoryOptions = {}) {
    if (options.client) {
      this.redis = options.client;
      this.ownsClient = false;
    } else if (options.url) {
      // Managed Redis is often IPv6-only; family=0 lets ioredis pick either stack.
      const redisUrl = new URL(options.url);
      if (!redisUrl.searchParams.has('family')) {
        redisUrl.searchParams.set('family', '0');
      }

      this.redis = new Redis(redisUrl.toString(), { lazyConnect: true });
      this.ownsClient = true;
    } else {
      throw new Error('RedisSessionStateRepository requires either a client or a url.');
    }

    this.prefix = options.prefix ?? DEFAULT_SESSION_KEY_PREFIX;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
  }

  async load(sessionId: string): Promise<PersistedSessionState | undefined> {
    const key = this.namespaced(sessionId);
    let raw: string | null;

    try {
      await this.ensureConnected();
      raw = await this.redis.get(key);
    } catch (error) {
      throw new StoreUnavailableError(`Failed to read session state for ${sessionId}`, error);
    }

    if (!raw) {
      return undefined;
    }

    try {
      return parsePersistedSessionState(JSON.parse(raw));
    } catch (error) {
      throw new CorruptSessionStateError(`Corrupt session state for ${sessionId}`, error);
    }
  }

  async save(sessionId: string, state: PersistedSessionState): Promise<void> {
    try {
      await this.ensureConnected();
      await this.redis.set(this.namespaced(sessionId), JSON.stringify(state), 'EX', this.ttlSeconds);
    } catch (error) {
      throw new StoreUnavailableError(`Failed to write session state for ${sessionId}`, error);
    }
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.redis.quit();
    }
  }

  private namespaced(sessionId: string): string {
    return `${this.prefix}${sessionId}`;
  }

  private async ensureConnected(): Promise<void> {
    if (!this.ownsClient) {
      return;
    }

    if (this.redis.status === 'ready' || this.redis.status === 'connecting') {
      return;
    }

    await this.redis.connect();
  }
}
