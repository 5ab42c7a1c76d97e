import { toError } from '../errors';
import type { LoggerLike } from '../logger';

import type { AdmissionPolicy } from './admission-policy';
import type { AttentionConfig } from './config';
import { DebounceCycle, type CyclePhase } from './debounce-aggregator';
import type { SessionEntry, SessionStateStore } from './session-state-store';
import type {
  AttentionObserver,
  Decision,
  Generator,
  InboundMessage,
  ReplySink,
  RouteOutcome,
} from './types';

export type DualPoolDispatcherOptions = Pick<
  AttentionConfig,
  'energyCostPerCycle' | 'debounceQuietPeriodSeconds' | 'debounceMaxWindowSeconds'
>;

export interface DualPoolDispatcherDependencies {
  store: SessionStateStore;
  policy: AdmissionPolicy;
  generator: Generator;
  replySink: ReplySink;
  logger?: LoggerLike;
  observer?: AttentionObserver;
  now?: () => number;
}

/**
 * Routes admitted messages per session. The sender holding the session lock
 * feeds the open debounce window; everyone else waits in the background pool
 * and is promoted into a fresh cycle once the current one is done.
 */
export class DualPoolDispatcher {
  private readonly cycles = new Map<string, DebounceCycle>();
  private readonly running = new Set<Promise<void>>();
  private readonly logger: LoggerLike;
  private readonly observer: AttentionObserver;

  constructor(
    private readonly deps: DualPoolDispatcherDependencies,
    private readonly options: DualPoolDispatcherOptions,
  ) {
    this.logger = deps.logger ?? {};
    this.observer = deps.observer ?? {};
  }

  get activeCycles(): number {
    return this.cycles.size;
  }

  cyclePhase(sessionId: string): CyclePhase | undefined {
    return this.cycles.get(sessionId)?.phase;
  }

  async onMessage(message: InboundMessage): Promise<RouteOutcome> {
    const entry = await this.deps.store.get(message.sessionId);
    entry.pin();

    try {
      const decision = await this.deps.policy.decide(entry, message);
      const outcome = this.route(entry, message, decision);
      this.observer.onRouted?.(message, outcome);
      this.logger.debug?.(
        { sessionId: message.sessionId, messageId: message.messageId, outcome },
        'Routed inbound message',
      );
      return outcome;
    } finally {
      entry.unpin();
    }
  }

  /**
   * Move the background pool into a new cycle when the session is free.
   * Returns false when the lock is held or nothing is waiting.
   */
  promoteBackground(entry: SessionEntry): boolean {
    if (entry.lock.held || entry.backgroundSize === 0) {
      return false;
    }

    const waiting = entry.drainBackground();
    const [first] = waiting;
    if (!first || !entry.lock.tryAcquire(first.senderId)) {
      return false;
    }

    for (const message of waiting) {
      entry.appendAccumulation(message);
    }

    this.logger.debug?.(
      { sessionId: entry.sessionId, owner: first.senderId, promoted: waiting.length },
      'Promoted background pool into a new cycle',
    );
    this.openCycle(entry);
    return true;
  }

  /** Close every open window early and wait for all cycles and promotions to finish. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      for (const cycle of this.cycles.values()) {
        cycle.closeNow();
      }
      await Promise.allSettled([...this.running]);
    }
  }

  private route(entry: SessionEntry, message: InboundMessage, decision: Decision): RouteOutcome {
    if (decision.action === 'IGNORE') {
      entry.rememberAmbient(message);
      return 'ignored';
    }

    // A freed lock with work still queued belongs to the queue, not to the newcomer.
    if (!entry.lock.held && entry.backgroundSize > 0) {
      this.defer(entry, message);
      this.promoteBackground(entry);
      return 'deferred';
    }

    if (entry.lock.tryAcquire(message.senderId)) {
      entry.appendAccumulation(message);
      this.openCycle(entry);
      return 'started';
    }

    const cycle = this.cycles.get(entry.sessionId);
    if (cycle?.extend(message)) {
      return 'extended';
    }

    this.defer(entry, message);
    return 'deferred';
  }

  private defer(entry: SessionEntry, message: InboundMessage): void {
    const dropped = entry.appendBackground(message);
    if (dropped) {
      this.logger.warn?.(
        { sessionId: entry.sessionId, droppedMessageId: dropped.messageId },
        'Background pool full; dropped oldest message',
      );
      this.observer.onBackgroundOverflow?.(entry.sessionId, dropped);
    }
  }

  private openCycle(entry: SessionEntry): void {
    const cycle = new DebounceCycle(entry, {
      store: this.deps.store,
      generator: this.deps.generator,
      replySink: this.deps.replySink,
      energyCostPerCycle: this.options.energyCostPerCycle,
      timings: {
        quietPeriodMs: this.options.debounceQuietPeriodSeconds * 1000,
        maxWindowMs: this.options.debounceMaxWindowSeconds * 1000,
      },
      logger: this.logger,
      observer: this.observer,
      now: this.deps.now,
    });

    this.cycles.set(entry.sessionId, cycle);
    this.track(this.runCycle(entry, cycle));
  }

  private async runCycle(entry: SessionEntry, cycle: DebounceCycle): Promise<void> {
    await cycle.run();

    if (this.cycles.get(entry.sessionId) === cycle) {
      this.cycles.delete(entry.sessionId);
    }

    this.track(this.schedulePromotion(entry));
  }

  /** Re-check the background pool on a fresh task rather than recursing from the finished cycle. */
  private schedulePromotion(entry: SessionEntry): Promise<void> {
    return new Promise<void>((resolve) => {
      setImmediate(() => {
        try {
          this.promoteBackground(entry);
        } catch (error) {
          this.logger.error?.(
            { sessionId: entry.sessionId, error: toError(error) },
            'Failed to promote background pool',
          );
        } finally {
          resolve();
        }
      });
    });
  }

  private track(task: Promise<void>): void {
    this.running.add(task);
    void task
      .catch((error: unknown) => {
        this.logger.error?.({ error: toError(error) }, 'Attention task failed');
      })
      .finally(() => {
        this.running.delete(task);
      });
  }
}
