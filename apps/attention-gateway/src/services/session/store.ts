import type { PersistedSessionState } from '@attention-gw/core';
import { z } from 'zod';

/** Optional configuration shared by the session state repositories. */
export interface SessionStoreContext {
  prefix?: string;
}

/** Durable records outlive the in-memory cache by a wide margin (30 days). */
export const DEFAULT_SESSION_TTL_SECONDS = 30 * 24 * 60 * 60;

export const DEFAULT_SESSION_KEY_PREFIX = 'attention:session:';

/** Shape checked on every read so a corrupt record never reaches the cache. */
export const persistedSessionStateSchema = z.object({
  sessionId: z.string().min(1),
  energy: z.number().min(0).max(1),
  mood: z.number().min(-1).max(1),
  lastReplyTime: z.number().int().nonnegative().optional(),
  lastDailyResetDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  lastMoodDecayTime: z.number().int().nonnegative(),
  totalReplies: z.number().int().nonnegative(),
});

export function parsePersistedSessionState(value: unknown): PersistedSessionState {
  return persistedSessionStateSchema.parse(value);
}
