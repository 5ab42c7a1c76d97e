import { CorruptSessionStateError } from '../errors';
import type { LoggerLike } from '../logger';

import { DEFAULT_ENERGY, DEFAULT_MOOD, clamp, formatLocalDate } from './config';
import { SessionLock } from './session-lock';
import type {
  AttentionObserver,
  InboundMessage,
  PersistedSessionState,
  SessionSnapshot,
  SessionStateRepository,
} from './types';

export interface SessionPoolLimits {
  backgroundPoolCapacity: number;
  ambientContextCapacity: number;
}

/** Result of a finished generation cycle, applied to the session in one step. */
export interface CycleOutcome {
  energyCost: number;
  /** Omitted when the generator failed or reported nothing. */
  sentimentDelta?: number;
  completedAt: number;
  replied: boolean;
}

/**
 * In-memory record for one session: persisted fields plus the runtime-only
 * lock, pools and bookkeeping. Energy and mood are clamped on every update.
 */
export class SessionEntry {
  readonly lock = new SessionLock();

  private state: PersistedSessionState;
  private readonly accumulation: InboundMessage[] = [];
  private readonly background: InboundMessage[] = [];
  private readonly ambient: InboundMessage[] = [];
  private pins = 0;
  private version = 0;
  private persistedVersion: number;
  private accessedAt: number;
  private unconfirmed: boolean;

  constructor(
    state: PersistedSessionState,
    options: { dirty: boolean; now: number; provisional?: boolean },
    private readonly limits: SessionPoolLimits,
  ) {
    this.state = normaliseState(state);
    this.persistedVersion = options.dirty ? -1 : 0;
    this.accessedAt = options.now;
    this.unconfirmed = options.provisional ?? false;
  }

  /**
   * Defaults standing in for a record the durable store could not return.
   * A provisional entry is never written back until a load has succeeded.
   */
  get provisional(): boolean {
    return this.unconfirmed;
  }

  get sessionId(): string {
    return this.state.sessionId;
  }

  get energy(): number {
    return this.state.energy;
  }

  get mood(): number {
    return this.state.mood;
  }

  get dirty(): boolean {
    return this.version !== this.persistedVersion;
  }

  get lastAccessTime(): number {
    return this.accessedAt;
  }

  get pinned(): boolean {
    return this.pins > 0;
  }

  get accumulationSize(): number {
    return this.accumulation.length;
  }

  get backgroundSize(): number {
    return this.background.length;
  }

  /** True when nothing references the session: no lock, no queued work, no admission in flight. */
  get idle(): boolean {
    return (
      !this.lock.held &&
      this.pins === 0 &&
      this.accumulation.length === 0 &&
      this.background.length === 0
    );
  }

  touch(now: number): void {
    this.accessedAt = Math.max(this.accessedAt, now);
  }

  pin(): void {
    this.pins += 1;
  }

  unpin(): void {
    this.pins = Math.max(0, this.pins - 1);
  }

  snapshot(): SessionSnapshot {
    return {
      sessionId: this.state.sessionId,
      energy: this.state.energy,
      mood: this.state.mood,
      lastReplyTime: this.state.lastReplyTime,
      totalReplies: this.state.totalReplies,
    };
  }

  toPersisted(): PersistedSessionState {
    return { ...this.state };
  }

  /**
   * Apply `mutator` to a copy of the persisted fields. The entry is marked
   * dirty only when a field actually changed.
   */
  update(mutator: (draft: PersistedSessionState) => void): boolean {
    const draft = { ...this.state };
    mutator(draft);
    const next = normaliseState({ ...draft, sessionId: this.state.sessionId });

    if (sameState(this.state, next)) {
      return false;
    }

    this.state = next;
    this.markDirty();
    return true;
  }

  markDirty(): void {
    this.version += 1;
  }

  /** Record that the state as of `version` reached the durable store. */
  markPersisted(version: number): void {
    this.persistedVersion = Math.max(this.persistedVersion, version);
  }

  get currentVersion(): number {
    return this.version;
  }

  /** Replace the provisional defaults with the durable record. Local changes are discarded. */
  rebase(state: PersistedSessionState): void {
    this.state = normaliseState({ ...state, sessionId: this.state.sessionId });
    this.unconfirmed = false;
    this.version += 1;
    this.persistedVersion = this.version;
  }

  /** The durable store has no record, so the defaults become the record to write. */
  confirm(): void {
    this.unconfirmed = false;
    this.markDirty();
  }

  appendAccumulation(message: InboundMessage): void {
    this.accumulation.push(message);
  }

  /** Snapshot-and-clear of the accumulation pool. */
  drainAccumulation(): InboundMessage[] {
    return this.accumulation.splice(0, this.accumulation.length);
  }

  /** Queue a deferred message. Returns the message dropped to stay within capacity, if any. */
  appendBackground(message: InboundMessage): InboundMessage | undefined {
    this.background.push(message);
    if (this.background.length > this.limits.backgroundPoolCapacity) {
      return this.background.shift();
    }
    return undefined;
  }

  drainBackground(): InboundMessage[] {
    return this.background.splice(0, this.background.length);
  }

  rememberAmbient(message: InboundMessage): void {
    if (this.limits.ambientContextCapacity <= 0) {
      return;
    }
    this.ambient.push(message);
    if (this.ambient.length > this.limits.ambientContextCapacity) {
      this.ambient.shift();
    }
  }

  ambientContext(): InboundMessage[] {
    return [...this.ambient];
  }
}

export interface SessionStateStoreOptions extends SessionPoolLimits {
  repository: SessionStateRepository;
  logger?: LoggerLike;
  observer?: AttentionObserver;
  now?: () => number;
}

/**
 * Write-back cache of session entries. Misses load from the durable store
 * (concurrent misses share one load); writes reach the store only through
 * `flush`, which the maintenance loop drives.
 */
export class SessionStateStore {
  private readonly entriesById = new Map<string, SessionEntry>();
  private readonly pendingLoads = new Map<string, Promise<SessionEntry>>();
  private readonly repository: SessionStateRepository;
  private readonly logger: LoggerLike;
  private readonly observer: AttentionObserver;
  private readonly limits: SessionPoolLimits;
  private readonly now: () => number;

  constructor(options: SessionStateStoreOptions) {
    this.repository = options.repository;
    this.logger = options.logger ?? {};
    this.observer = options.observer ?? {};
    this.now = options.now ?? Date.now;
    this.limits = {
      backgroundPoolCapacity: options.backgroundPoolCapacity,
      ambientContextCapacity: options.ambientContextCapacity,
    };
  }

  get size(): number {
    return this.entriesById.size;
  }

  async get(sessionId: string): Promise<SessionEntry> {
    const cached = this.entriesById.get(sessionId);
    if (cached) {
      cached.touch(this.now());
      return cached;
    }

    const pending = this.pendingLoads.get(sessionId);
    if (pending) {
      return pending;
    }

    const load = this.load(sessionId).finally(() => {
      this.pendingLoads.delete(sessionId);
    });
    this.pendingLoads.set(sessionId, load);
    return load;
  }

  peek(sessionId: string): SessionEntry | undefined {
    return this.entriesById.get(sessionId);
  }

  entries(): SessionEntry[] {
    return [...this.entriesById.values()];
  }

  markDirty(sessionId: string): void {
    this.entriesById.get(sessionId)?.markDirty();
  }

  mutate(sessionId: string, mutator: (draft: PersistedSessionState) => void): boolean {
    return this.entriesById.get(sessionId)?.update(mutator) ?? false;
  }

  /** Charge the cycle's energy cost and fold in the reported sentiment. */
  applyCycleOutcome(entry: SessionEntry, outcome: CycleOutcome): void {
    entry.update((draft) => {
      draft.energy -= outcome.energyCost;
      draft.lastReplyTime = outcome.completedAt;

      if (outcome.sentimentDelta !== undefined && Number.isFinite(outcome.sentimentDelta)) {
        draft.mood += outcome.sentimentDelta;
        draft.lastMoodDecayTime = outcome.completedAt;
      }

      if (outcome.replied) {
        draft.totalReplies += 1;
      }
    });
  }

  /**
   * Persist the entry when dirty. The dirty flag is cleared only for the
   * version that was written; a failed write leaves it set for the next pass.
   */
  async flush(sessionId: string): Promise<boolean> {
    const entry = this.entriesById.get(sessionId);
    if (!entry) {
      return true;
    }

    if (entry.provisional && !(await this.reconcile(entry))) {
      this.observer.onFlush?.(sessionId, false);
      return false;
    }

    if (!entry.dirty) {
      return true;
    }

    const version = entry.currentVersion;
    const state = entry.toPersisted();

    try {
      await this.repository.save(sessionId, state);
      entry.markPersisted(version);
      this.observer.onFlush?.(sessionId, true);
      return true;
    } catch (error) {
      this.logger.warn?.({ sessionId, error }, 'Failed to persist session state; will retry');
      this.observer.onFlush?.(sessionId, false);
      return false;
    }
  }

  /** Flush every cached entry. Resolves with the number of failed writes. */
  async flushAll(): Promise<number> {
    const results = await Promise.all(this.entries().map((entry) => this.flush(entry.sessionId)));
    return results.filter((succeeded) => !succeeded).length;
  }

  /**
   * Drop the entry from the cache when it has been untouched for `ttlMs` and
   * holds nothing that would be lost. Refuses otherwise.
   */
  evictIfIdle(sessionId: string, ttlMs: number, now: number = this.now()): boolean {
    const entry = this.entriesById.get(sessionId);
    if (!entry || entry.dirty || !entry.idle) {
      return false;
    }

    if (now - entry.lastAccessTime < ttlMs) {
      return false;
    }

    this.entriesById.delete(sessionId);
    this.observer.onEvicted?.(sessionId);
    this.logger.debug?.({ sessionId }, 'Evicted idle session');
    return true;
  }

  /** Retry the load behind a provisional entry. False while the store is still failing. */
  private async reconcile(entry: SessionEntry): Promise<boolean> {
    let persisted: PersistedSessionState | undefined;

    try {
      persisted = await this.repository.load(entry.sessionId);
    } catch (error) {
      if (!(error instanceof CorruptSessionStateError)) {
        this.logger.warn?.(
          { sessionId: entry.sessionId, error },
          'Session state still unavailable; keeping provisional defaults',
        );
        return false;
      }
    }

    if (persisted) {
      entry.rebase(persisted);
      this.logger.info?.({ sessionId: entry.sessionId }, 'Restored session state after store recovery');
    } else {
      entry.confirm();
    }
    return true;
  }

  private async load(sessionId: string): Promise<SessionEntry> {
    const now = this.now();
    let entry: SessionEntry;

    try {
      const persisted = await this.repository.load(sessionId);
      entry = persisted
        ? new SessionEntry({ ...persisted, sessionId }, { dirty: false, now }, this.limits)
        : new SessionEntry(createDefaultState(sessionId, now), { dirty: true, now }, this.limits);
    } catch (error) {
      const corrupt = error instanceof CorruptSessionStateError;
      this.logger.warn?.(
        { sessionId, error },
        corrupt
          ? 'Discarding corrupt session state; using defaults'
          : 'Failed to load session state; using provisional defaults',
      );
      entry = new SessionEntry(
        createDefaultState(sessionId, now),
        { dirty: corrupt, now, provisional: !corrupt },
        this.limits,
      );
    }

    this.entriesById.set(sessionId, entry);
    return entry;
  }
}

export function createDefaultState(sessionId: string, now: number): PersistedSessionState {
  return {
    sessionId,
    energy: DEFAULT_ENERGY,
    mood: DEFAULT_MOOD,
    lastDailyResetDate: formatLocalDate(now),
    lastMoodDecayTime: now,
    totalReplies: 0,
  };
}

function normaliseState(state: PersistedSessionState): PersistedSessionState {
  return {
    ...state,
    energy: clamp(Number.isFinite(state.energy) ? state.energy : DEFAULT_ENERGY, 0, 1),
    mood: clamp(Number.isFinite(state.mood) ? state.mood : DEFAULT_MOOD, -1, 1),
  };
}

function sameState(left: PersistedSessionState, right: PersistedSessionState): boolean {
  return (
    left.energy === right.energy &&
    left.mood === right.mood &&
    left.lastReplyTime === right.lastReplyTime &&
    left.lastDailyResetDate === right.lastDailyResetDate &&
    left.lastMoodDecayTime === right.lastMoodDecayTime &&
    left.totalReplies === right.totalReplies
  );
}
