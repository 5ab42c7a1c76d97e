import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DebounceCycle } from '../src/attention/debounce-aggregator';
import { SessionStateStore } from '../src/attention/session-state-store';
import type { Generator, InboundMessage, ReplySink } from '../src/attention/types';

import { FakeRepository, createLoggerStub, createMessage } from './helpers';

beforeEach(() => {
  vi.useFakeTimers({
    toFake: ['setTimeout', 'clearTimeout', 'setInterval', 'clearInterval', 'Date'],
  });
});

afterEach(() => {
  vi.useRealTimers();
});

async function openCycle(
  first: InboundMessage,
  overrides: { generate?: Generator['generate']; deliver?: ReplySink['deliver'] } = {},
) {
  const store = new SessionStateStore({
    repository: new FakeRepository(),
    backgroundPoolCapacity: 10,
    ambientContextCapacity: 10,
  });
  const entry = await store.get(first.sessionId);
  entry.lock.tryAcquire(first.senderId);
  entry.appendAccumulation(first);

  const generate = vi
    .fn<Generator['generate']>()
    .mockImplementation(
      overrides.generate ?? (async () => ({ replyText: 'Sure thing', sentimentDelta: 0.2 })),
    );
  const deliver = vi
    .fn<ReplySink['deliver']>()
    .mockImplementation(overrides.deliver ?? (async () => undefined));
  const logger = createLoggerStub();
  const onCycleFinished = vi.fn();

  const cycle = new DebounceCycle(entry, {
    store,
    generator: { generate },
    replySink: { deliver },
    energyCostPerCycle: 0.05,
    timings: { quietPeriodMs: 2_000, maxWindowMs: 5_000 },
    logger,
    observer: { onCycleFinished },
  });
  const finished = cycle.run();

  return { store, entry, cycle, finished, generate, deliver, logger, onCycleFinished };
}

describe('DebounceCycle', () => {
  it('refuses to open without the session lock', async () => {
    const store = new SessionStateStore({
      repository: new FakeRepository(),
      backgroundPoolCapacity: 10,
      ambientContextCapacity: 10,
    });
    const entry = await store.get('session-1');

    expect(
      () =>
        new DebounceCycle(entry, {
          store,
          generator: { generate: vi.fn() },
          replySink: { deliver: vi.fn() },
          energyCostPerCycle: 0.05,
          timings: { quietPeriodMs: 1, maxWindowMs: 1 },
        }),
    ).toThrow('Cannot open a debounce cycle for session-1 without holding its lock');
  });

  it('fires once the quiet period passes without new owner messages', async () => {
    const message = createMessage();
    const { cycle, generate, finished } = await openCycle(message);

    expect(cycle.phase).toBe('waiting');
    await vi.advanceTimersByTimeAsync(1_999);
    expect(generate).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(generate).toHaveBeenCalledTimes(1);
    expect(generate.mock.calls[0]?.[0].messages).toEqual([message]);

    await expect(finished).resolves.toMatchObject({
      batchSize: 1,
      closeReason: 'quiet',
      status: 'replied',
    });
    expect(cycle.phase).toBe('done');
  });

  it('restarts the quiet period for each owner message', async () => {
    const first = createMessage();
    const { cycle, generate } = await openCycle(first);

    await vi.advanceTimersByTimeAsync(1_500);
    const second = createMessage();
    expect(cycle.extend(second)).toBe(true);

    await vi.advanceTimersByTimeAsync(1_999);
    expect(generate).not.toHaveBeenCalled();

    await vi.advanceTimersByTimeAsync(1);
    expect(generate.mock.calls[0]?.[0].messages).toEqual([first, second]);
  });

  it('closes at the ceiling under continuous chatter', async () => {
    const { cycle, generate, finished } = await openCycle(createMessage());

    for (let elapsed = 1_000; elapsed < 5_000; elapsed += 1_000) {
      await vi.advanceTimersByTimeAsync(1_000);
      expect(cycle.extend(createMessage())).toBe(true);
    }
    await vi.advanceTimersByTimeAsync(1_000);

    expect(generate).toHaveBeenCalledTimes(1);
    await expect(finished).resolves.toMatchObject({ batchSize: 5, closeReason: 'ceiling' });
  });

  it('rejects messages from other senders', async () => {
    const { cycle } = await openCycle(createMessage({ senderId: 'user-x' }));

    expect(cycle.extend(createMessage({ senderId: 'user-y' }))).toBe(false);
  });

  it('stops accepting owner messages once the batch is drained', async () => {
    let finishGeneration: () => void = () => undefined;
    const { cycle, entry, finished } = await openCycle(createMessage(), {
      generate: () =>
        new Promise((resolve) => {
          finishGeneration = () => resolve({ replyText: 'done' });
        }),
    });

    await vi.advanceTimersByTimeAsync(2_000);

    expect(cycle.phase).toBe('closing');
    expect(cycle.extend(createMessage())).toBe(false);
    expect(entry.accumulationSize).toBe(0);
    expect(entry.lock.held).toBe(true);

    finishGeneration();
    await finished;
    expect(entry.lock.held).toBe(false);
  });

  it('applies energy cost and sentiment, then delivers the reply and releases the lock', async () => {
    const first = createMessage({ messageId: 'm-1' });
    const { entry, deliver, finished, cycle } = await openCycle(first);

    await vi.advanceTimersByTimeAsync(2_000);
    await finished;

    expect(entry.energy).toBeCloseTo(0.75);
    expect(entry.mood).toBeCloseTo(0.2);
    expect(entry.toPersisted().totalReplies).toBe(1);
    expect(entry.lock.held).toBe(false);
    expect(entry.lock.owner).toBeUndefined();
    expect(deliver).toHaveBeenCalledWith({
      sessionId: 'session-1',
      cycleId: cycle.cycleId,
      ownerSenderId: 'user-x',
      replyText: 'Sure thing',
      messageIds: ['m-1'],
    });
  });

  it('charges energy but keeps mood when generation fails', async () => {
    const { entry, deliver, finished, logger } = await openCycle(createMessage(), {
      generate: async () => {
        throw new Error('model overloaded');
      },
    });

    await vi.advanceTimersByTimeAsync(2_000);

    await expect(finished).resolves.toMatchObject({ status: 'failed' });
    expect(entry.energy).toBeCloseTo(0.75);
    expect(entry.mood).toBe(0);
    expect(entry.lock.held).toBe(false);
    expect(entry.toPersisted().lastReplyTime).toBe(Date.now());
    expect(deliver).not.toHaveBeenCalled();
    expect(logger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId: 'session-1' }),
      'Generation failed; charging energy and keeping mood',
    );
  });

  it('stays silent on an empty reply', async () => {
    const { deliver, finished, entry } = await openCycle(createMessage(), {
      generate: async () => ({ replyText: '   ' }),
    });

    await vi.advanceTimersByTimeAsync(2_000);

    await expect(finished).resolves.toMatchObject({ status: 'silent' });
    expect(deliver).not.toHaveBeenCalled();
    expect(entry.toPersisted().totalReplies).toBe(0);
  });

  it('reports delivery failures without holding the lock', async () => {
    const { finished, entry, logger } = await openCycle(createMessage(), {
      deliver: async () => {
        throw new Error('callback down');
      },
    });

    await vi.advanceTimersByTimeAsync(2_000);

    await expect(finished).resolves.toMatchObject({ status: 'failed' });
    expect(entry.lock.held).toBe(false);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ sessionId: 'session-1' }),
      'Failed to deliver reply',
    );
  });

  it('closes immediately when asked to', async () => {
    const { cycle, generate, finished, onCycleFinished } = await openCycle(createMessage());

    cycle.closeNow();
    await vi.advanceTimersByTimeAsync(0);

    expect(generate).toHaveBeenCalledTimes(1);
    const summary = await finished;
    expect(summary.closeReason).toBe('shutdown');
    expect(onCycleFinished).toHaveBeenCalledWith(summary);
  });
});
