import { toError } from '../errors';
import type { LoggerLike } from '../logger';

import { type AttentionConfig, formatLocalDate } from './config';
import type { SessionStateStore } from './session-state-store';
import type { AttentionObserver, MaintenanceReport, PersistedSessionState } from './types';

export type StateDecayOptions = Pick<
  AttentionConfig,
  | 'maintenanceIntervalSeconds'
  | 'energyRecoverySilenceMinutes'
  | 'energyRecoveryStep'
  | 'energyRecoveryCeiling'
  | 'energyDailyRecovery'
  | 'moodDecayIntervalSeconds'
  | 'moodDecayStep'
  | 'evictionTtlSeconds'
>;

type MaintenanceChange = 'dailyReset' | 'recovered' | 'moodDecayed';

/**
 * Background maintenance over the session cache: daily reset, passive energy
 * recovery, mood decay, write-back of dirty entries and eviction of idle ones.
 * Ticks never overlap; a failing tick is logged and the next one runs as usual.
 */
export class StateDecayScheduler {
  private timer: NodeJS.Timeout | undefined;
  private inFlight: Promise<void> | undefined;

  constructor(
    private readonly store: SessionStateStore,
    private readonly options: StateDecayOptions,
    private readonly logger: LoggerLike = {},
    private readonly observer: AttentionObserver = {},
  ) {}

  get started(): boolean {
    return this.timer !== undefined;
  }

  start(): void {
    if (this.timer) {
      return;
    }

    this.timer = setInterval(() => {
      void this.runScheduledTick();
    }, this.options.maintenanceIntervalSeconds * 1000);
    this.timer.unref();
  }

  /** Stop the interval and wait for a tick that is already running. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    await this.inFlight;
  }

  async tick(now: number = Date.now()): Promise<MaintenanceReport> {
    const report: MaintenanceReport = {
      cachedSessions: 0,
      recovered: 0,
      moodDecayed: 0,
      dailyReset: 0,
      flushed: 0,
      flushFailures: 0,
      evicted: 0,
    };

    for (const entry of this.store.entries()) {
      const changes: MaintenanceChange[] = [];
      this.store.mutate(entry.sessionId, (draft) => {
        changes.push(...applyMaintenance(draft, now, this.options));
      });
      for (const change of changes) {
        report[change] += 1;
      }

      if (entry.dirty || entry.provisional) {
        if (await this.store.flush(entry.sessionId)) {
          report.flushed += 1;
        } else {
          report.flushFailures += 1;
        }
      }

      if (this.store.evictIfIdle(entry.sessionId, this.options.evictionTtlSeconds * 1000, now)) {
        report.evicted += 1;
      }
    }

    report.cachedSessions = this.store.size;
    this.observer.onMaintenance?.(report);
    this.logger.debug?.(report, 'Maintenance tick complete');
    return report;
  }

  private async runScheduledTick(): Promise<void> {
    if (this.inFlight) {
      this.logger.debug?.({}, 'Previous maintenance tick still running; skipping');
      return;
    }

    this.inFlight = this.tick().then(
      () => undefined,
      (error: unknown) => {
        this.logger.error?.({ error: toError(error) }, 'Maintenance tick failed');
      },
    );

    try {
      await this.inFlight;
    } finally {
      this.inFlight = undefined;
    }
  }
}

/**
 * Apply time-based adjustments to one session's persisted fields and report
 * which of them fired.
 */
export function applyMaintenance(
  draft: PersistedSessionState,
  now: number,
  options: StateDecayOptions,
): MaintenanceChange[] {
  const changes: MaintenanceChange[] = [];

  const today = formatLocalDate(now);
  if (draft.lastDailyResetDate !== today) {
    draft.energy = Math.min(1, draft.energy + options.energyDailyRecovery);
    draft.mood = 0;
    draft.lastDailyResetDate = today;
    draft.lastMoodDecayTime = now;
    changes.push('dailyReset');
  }

  const silenceMs = options.energyRecoverySilenceMinutes * 60_000;
  if (
    draft.lastReplyTime !== undefined &&
    now - draft.lastReplyTime > silenceMs &&
    draft.energy < options.energyRecoveryCeiling
  ) {
    draft.energy = Math.min(options.energyRecoveryCeiling, draft.energy + options.energyRecoveryStep);
    changes.push('recovered');
  }

  if (draft.mood !== 0 && now - draft.lastMoodDecayTime >= options.moodDecayIntervalSeconds * 1000) {
    draft.mood =
      draft.mood > 0
        ? Math.max(0, draft.mood - options.moodDecayStep)
        : Math.min(0, draft.mood + options.moodDecayStep);
    draft.lastMoodDecayTime = now;
    changes.push('moodDecayed');
  }

  return changes;
}
