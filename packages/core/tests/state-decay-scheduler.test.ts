import { afterEach, describe, expect, it, vi } from 'vitest';

import { formatLocalDate } from '../src/attention/config';
import { SessionStateStore } from '../src/attention/session-state-store';
import {
  StateDecayScheduler,
  applyMaintenance,
  type StateDecayOptions,
} from '../src/attention/state-decay-scheduler';
import type { AttentionObserver, PersistedSessionState } from '../src/attention/types';

import { FakeRepository, createLoggerStub } from './helpers';

const NOW = new Date(2024, 5, 15, 12, 0, 0).getTime();
const MINUTE = 60_000;

const options: StateDecayOptions = {
  maintenanceIntervalSeconds: 60,
  energyRecoverySilenceMinutes: 60,
  energyRecoveryStep: 0.1,
  energyRecoveryCeiling: 0.8,
  energyDailyRecovery: 0.2,
  moodDecayIntervalSeconds: 300,
  moodDecayStep: 0.1,
  evictionTtlSeconds: 600,
};

function persisted(overrides: Partial<PersistedSessionState> = {}): PersistedSessionState {
  return {
    sessionId: 'session-1',
    energy: 0.5,
    mood: 0,
    lastDailyResetDate: formatLocalDate(NOW),
    lastMoodDecayTime: NOW,
    totalReplies: 0,
    ...overrides,
  };
}

async function createScheduler(
  seed: PersistedSessionState | undefined,
  observer: AttentionObserver = {},
) {
  const repository = new FakeRepository();
  if (seed) {
    repository.saved.set(seed.sessionId, seed);
  }
  const store = new SessionStateStore({
    repository,
    backgroundPoolCapacity: 5,
    ambientContextCapacity: 5,
    now: () => NOW,
  });
  const entry = await store.get(seed?.sessionId ?? 'session-1');
  repository.save.mockClear();
  const logger = createLoggerStub();
  const scheduler = new StateDecayScheduler(store, options, logger, observer);

  return { repository, store, entry, scheduler, logger };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('StateDecayScheduler.tick', () => {
  it('recovers energy after a long silence', async () => {
    const { scheduler, entry, repository } = await createScheduler(
      persisted({ energy: 0.5, lastReplyTime: NOW - 90 * MINUTE }),
    );

    const report = await scheduler.tick(NOW);

    expect(entry.energy).toBeCloseTo(0.6);
    expect(report).toEqual({
      cachedSessions: 1,
      recovered: 1,
      moodDecayed: 0,
      dailyReset: 0,
      flushed: 1,
      flushFailures: 0,
      evicted: 0,
    });
    expect(repository.save).toHaveBeenCalledWith('session-1', entry.toPersisted());
    expect(entry.dirty).toBe(false);
  });

  it('caps passive recovery at the ceiling', async () => {
    const { scheduler, entry } = await createScheduler(
      persisted({ energy: 0.75, lastReplyTime: NOW - 90 * MINUTE }),
    );

    await scheduler.tick(NOW);

    expect(entry.energy).toBe(0.8);
  });

  it('leaves recently active and never-replied sessions alone', async () => {
    const recent = await createScheduler(persisted({ lastReplyTime: NOW - 30 * MINUTE }));
    const quiet = await createScheduler(persisted());

    await expect(recent.scheduler.tick(NOW)).resolves.toMatchObject({ recovered: 0, flushed: 0 });
    await expect(quiet.scheduler.tick(NOW)).resolves.toMatchObject({ recovered: 0, flushed: 0 });
    expect(recent.entry.energy).toBe(0.5);
    expect(quiet.entry.energy).toBe(0.5);
  });

  it('decays mood toward zero once the interval has passed', async () => {
    const { scheduler, entry } = await createScheduler(
      persisted({ mood: -0.5, lastMoodDecayTime: NOW - 5 * MINUTE }),
    );

    const report = await scheduler.tick(NOW);

    expect(report.moodDecayed).toBe(1);
    expect(entry.mood).toBeCloseTo(-0.4);
    expect(entry.toPersisted().lastMoodDecayTime).toBe(NOW);
  });

  it('applies the daily reset on a new calendar day', async () => {
    const yesterday = formatLocalDate(NOW - 24 * 60 * MINUTE);
    const { scheduler, entry } = await createScheduler(
      persisted({ energy: 0.9, mood: 0.6, lastDailyResetDate: yesterday }),
    );

    const report = await scheduler.tick(NOW);

    expect(report.dailyReset).toBe(1);
    expect(entry.energy).toBe(1);
    expect(entry.mood).toBe(0);
    expect(entry.toPersisted().lastDailyResetDate).toBe(formatLocalDate(NOW));
  });

  it('keeps failed writes dirty and retries them on the next tick', async () => {
    const { scheduler, entry, repository, store } = await createScheduler(undefined);
    repository.save.mockRejectedValueOnce(new Error('store offline'));

    const first = await scheduler.tick(NOW + 11 * MINUTE);
    expect(first).toMatchObject({ flushed: 0, flushFailures: 1, evicted: 0 });
    expect(entry.dirty).toBe(true);
    expect(store.peek('session-1')).toBe(entry);

    const second = await scheduler.tick(NOW + 12 * MINUTE);
    expect(second).toMatchObject({ flushed: 1, flushFailures: 0, evicted: 1 });
  });

  it('reconciles sessions that started from provisional defaults', async () => {
    const repository = new FakeRepository();
    repository.saved.set('session-1', persisted({ energy: 0.2, totalReplies: 42 }));
    repository.load.mockRejectedValueOnce(new Error('connection refused'));
    const store = new SessionStateStore({
      repository,
      backgroundPoolCapacity: 5,
      ambientContextCapacity: 5,
      now: () => NOW,
    });
    const entry = await store.get('session-1');
    const scheduler = new StateDecayScheduler(store, options, createLoggerStub());

    const report = await scheduler.tick(NOW);

    expect(report).toMatchObject({ flushed: 1, flushFailures: 0 });
    expect(repository.save).not.toHaveBeenCalled();
    expect(entry.provisional).toBe(false);
    expect(entry.energy).toBe(0.2);
    expect(entry.toPersisted().totalReplies).toBe(42);
  });

  it('evicts clean sessions idle past the TTL', async () => {
    const onEvicted = vi.fn();
    const { scheduler, store } = await createScheduler(persisted(), { onEvicted });

    const report = await scheduler.tick(NOW + 11 * MINUTE);

    expect(report).toMatchObject({ evicted: 1, cachedSessions: 0 });
    expect(store.peek('session-1')).toBeUndefined();
    expect(onEvicted).toHaveBeenCalledWith('session-1');
  });

  it('never evicts a session with a cycle in progress', async () => {
    const { scheduler, entry, store } = await createScheduler(persisted());
    entry.lock.tryAcquire('user-x');

    const report = await scheduler.tick(NOW + 11 * MINUTE);

    expect(report.evicted).toBe(0);
    expect(store.peek('session-1')).toBe(entry);
  });

  it('reports each pass to the observer', async () => {
    const onMaintenance = vi.fn();
    const { scheduler } = await createScheduler(persisted(), { onMaintenance });

    const report = await scheduler.tick(NOW);

    expect(onMaintenance).toHaveBeenCalledWith(report);
  });
});

describe('StateDecayScheduler timer', () => {
  it('runs a tick every interval until stopped', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    const { scheduler, repository } = await createScheduler(undefined);

    scheduler.start();
    expect(scheduler.started).toBe(true);

    await vi.advanceTimersByTimeAsync(59_999);
    expect(repository.save).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(repository.save).toHaveBeenCalledTimes(1);

    await scheduler.stop();
    expect(scheduler.started).toBe(false);
  });

  it('logs a failing tick instead of throwing', async () => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    const onMaintenance = vi.fn(() => {
      throw new Error('metrics exploded');
    });
    const { scheduler, logger } = await createScheduler(persisted(), { onMaintenance });

    scheduler.start();
    await vi.advanceTimersByTimeAsync(60_000);
    await scheduler.stop();

    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ error: expect.any(Error) }),
      'Maintenance tick failed',
    );
  });
});

describe('applyMaintenance', () => {
  it('does not push mood past zero', () => {
    const draft = persisted({ mood: 0.05, lastMoodDecayTime: NOW - 10 * MINUTE });

    expect(applyMaintenance(draft, NOW, options)).toEqual(['moodDecayed']);
    expect(draft.mood).toBe(0);
  });

  it('reports nothing for a settled session', () => {
    const draft = persisted();

    expect(applyMaintenance(draft, NOW, options)).toEqual([]);
    expect(draft).toEqual(persisted());
  });
});
