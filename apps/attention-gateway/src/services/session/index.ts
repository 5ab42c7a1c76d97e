export {
  DEFAULT_SESSION_KEY_PREFIX,
  DEFAULT_SESSION_TTL_SECONDS,
  parsePersistedSessionState,
  persistedSessionStateSchema,
  type SessionStoreContext,
} from './store';
export {
  InMemorySessionStateRepository,
  type InMemorySessionStateRepositoryOptions,
} from './in-memory-store';
export {
  RedisSessionStateRepository,
  type RedisLike,
  type RedisSessionStateRepositoryOptions,
} from './redis-store';
