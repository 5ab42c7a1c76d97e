import { randomUUID } from 'node:crypto';

import { toError } from '../errors';
import type { LoggerLike } from '../logger';

import type { SessionEntry, SessionStateStore } from './session-state-store';
import type {
  AttentionObserver,
  CycleCloseReason,
  CycleStatus,
  CycleSummary,
  Generator,
  InboundMessage,
  ReplySink,
} from './types';

export type CyclePhase = 'open' | 'waiting' | 'closing' | 'done';

export interface DebounceTimings {
  quietPeriodMs: number;
  maxWindowMs: number;
}

export interface DebounceCycleDependencies {
  store: SessionStateStore;
  generator: Generator;
  replySink: ReplySink;
  energyCostPerCycle: number;
  timings: DebounceTimings;
  logger?: LoggerLike;
  observer?: AttentionObserver;
  now?: () => number;
}

/**
 * One aggregation window for a session whose lock is already held by the
 * owner. The quiet timer restarts on every owner message; the ceiling timer is
 * armed once and forces the window shut under continuous chatter. Closing
 * drains the accumulation pool, runs the generator once, applies the state
 * deltas and releases the lock.
 */
export class DebounceCycle {
  readonly cycleId = randomUUID();
  readonly ownerSenderId: string;

  private state: CyclePhase = 'open';
  private quietTimer: NodeJS.Timeout | undefined;
  private ceilingTimer: NodeJS.Timeout | undefined;
  private openedAt = 0;
  private settle: ((summary: CycleSummary) => void) | undefined;
  private readonly logger: LoggerLike;
  private readonly observer: AttentionObserver;
  private readonly now: () => number;

  constructor(
    private readonly entry: SessionEntry,
    private readonly deps: DebounceCycleDependencies,
  ) {
    const owner = entry.lock.owner;
    if (owner === undefined) {
      throw new Error(`Cannot open a debounce cycle for ${entry.sessionId} without holding its lock`);
    }
    this.ownerSenderId = owner;
    this.logger = deps.logger ?? {};
    this.observer = deps.observer ?? {};
    this.now = deps.now ?? Date.now;
  }

  get phase(): CyclePhase {
    return this.state;
  }

  /**
   * Arm the timers and resolve once the cycle is done. Never rejects: every
   * failure is folded into the summary.
   */
  run(): Promise<CycleSummary> {
    if (this.state !== 'open') {
      return Promise.reject(new Error(`Debounce cycle ${this.cycleId} already started`));
    }

    return new Promise<CycleSummary>((resolve) => {
      this.settle = resolve;
      this.state = 'waiting';
      this.openedAt = this.now();
      this.ceilingTimer = setTimeout(() => {
        void this.close('ceiling');
      }, this.deps.timings.maxWindowMs);
      this.armQuietTimer();
    });
  }

  /** Append an owner message and restart the quiet period. False once closing. */
  extend(message: InboundMessage): boolean {
    if (this.state !== 'waiting' || message.senderId !== this.ownerSenderId) {
      return false;
    }

    this.entry.appendAccumulation(message);
    this.armQuietTimer();
    return true;
  }

  /** Close immediately, skipping the remaining quiet period. */
  closeNow(): void {
    if (this.state === 'waiting') {
      void this.close('shutdown');
    }
  }

  private armQuietTimer(): void {
    if (this.quietTimer) {
      clearTimeout(this.quietTimer);
    }
    this.quietTimer = setTimeout(() => {
      void this.close('quiet');
    }, this.deps.timings.quietPeriodMs);
  }

  private clearTimers(): void {
    clearTimeout(this.quietTimer);
    clearTimeout(this.ceilingTimer);
    this.quietTimer = undefined;
    this.ceilingTimer = undefined;
  }

  private async close(reason: CycleCloseReason): Promise<void> {
    if (this.state !== 'waiting') {
      return;
    }

    this.state = 'closing';
    this.clearTimers();

    const batch = this.entry.drainAccumulation();
    let status: CycleStatus = 'failed';

    try {
      status = await this.process(batch);
    } catch (error) {
      this.logger.error?.(
        { sessionId: this.entry.sessionId, cycleId: this.cycleId, error: toError(error) },
        'Debounce cycle failed unexpectedly',
      );
    }

    this.entry.lock.release();
    this.state = 'done';

    const summary: CycleSummary = {
      cycleId: this.cycleId,
      sessionId: this.entry.sessionId,
      ownerSenderId: this.ownerSenderId,
      batchSize: batch.length,
      closeReason: reason,
      status,
      durationMs: this.now() - this.openedAt,
    };

    this.logger.info?.(summary, 'Debounce cycle finished');
    this.observer.onCycleFinished?.(summary);
    this.settle?.(summary);
    this.settle = undefined;
  }

  /** Generate for the drained batch, apply the state deltas and deliver the reply. */
  private async process(batch: InboundMessage[]): Promise<CycleStatus> {
    const sessionId = this.entry.sessionId;
    let status: CycleStatus = 'silent';
    let sentimentDelta: number | undefined;
    let replyText = '';

    if (batch.length > 0) {
      try {
        const result = await this.deps.generator.generate({
          sessionId,
          cycleId: this.cycleId,
          ownerSenderId: this.ownerSenderId,
          messages: batch,
          ambientContext: this.entry.ambientContext(),
          state: this.entry.snapshot(),
        });
        replyText = result.replyText.trim();
        sentimentDelta = result.sentimentDelta;
        status = replyText ? 'replied' : 'silent';
      } catch (error) {
        status = 'failed';
        this.logger.warn?.(
          { sessionId, cycleId: this.cycleId, error: toError(error) },
          'Generation failed; charging energy and keeping mood',
        );
      }
    }

    this.deps.store.applyCycleOutcome(this.entry, {
      energyCost: this.deps.energyCostPerCycle,
      sentimentDelta: status === 'failed' ? undefined : sentimentDelta,
      completedAt: this.now(),
      replied: status === 'replied',
    });

    if (status !== 'replied') {
      return status;
    }

    return this.deliver(batch, replyText);
  }

  private async deliver(batch: InboundMessage[], replyText: string): Promise<CycleStatus> {
    try {
      await this.deps.replySink.deliver({
        sessionId: this.entry.sessionId,
        cycleId: this.cycleId,
        ownerSenderId: this.ownerSenderId,
        replyText,
        messageIds: batch.map((message) => message.messageId),
      });
      return 'replied';
    } catch (error) {
      this.logger.error?.(
        { sessionId: this.entry.sessionId, cycleId: this.cycleId, error: toError(error) },
        'Failed to deliver reply',
      );
      return 'failed';
    }
  }
}
