import { EventBus } from '../../src/bus/event-bus';
import { EventSynchronizer } from '../../src/bus/event-synchronizer';
import { CancellationError, TimeoutError } from '../../src/domain/errors';
import { delay } from '../helpers';

describe('EventSynchronizer', () => {
  let bus: EventBus;
  let sync: EventSynchronizer;

  beforeEach(() => {
    bus = new EventBus();
    sync = new EventSynchronizer(bus, {
      config: { gracePeriodMs: 0, subscriptionGraceMs: 0, defaultTimeoutMs: 500, maxBufferedEvents: 3 },
    });
  });

  afterEach(() => {
    sync.cleanup();
  });

  test('resolves with an event published after the wait started', async () => {
    const waiting = sync.waitForEvent('/cue/done');
    await delay(5);
    await bus.publish('/cue/done', { cue: 1 });
    await expect(waiting).resolves.toEqual({ cue: 1 });
  });

  test('replays an event buffered before the wait', async () => {
    await sync.watch('/cue/done');
    await bus.publish('/cue/done', { cue: 1 });

    expect(sync.hasReceived('/cue/done')).toBe(true);
    await expect(sync.waitForEvent('/cue/done', { timeoutMs: 20 })).resolves.toEqual({ cue: 1 });
  });

  test('non-matching events leave the waiter parked', async () => {
    await sync.watch('/cue/done');
    await bus.publish('/cue/done', { cue: 1 });

    const waiting = sync.waitForEvent('/cue/done', { condition: (payload) => payload.cue === 2 });
    await bus.publish('/cue/done', { cue: 3 });
    await bus.publish('/cue/done', { cue: 2 });
    await expect(waiting).resolves.toEqual({ cue: 2 });
  });

  test('a condition that throws counts as no match', async () => {
    const waiting = sync.waitForEvent('/cue/done', {
      timeoutMs: 30,
      condition: () => {
        throw new Error('bad predicate');
      },
    });
    await bus.publish('/cue/done', { cue: 1 });
    await expect(waiting).rejects.toBeInstanceOf(TimeoutError);
  });

  test('times out when nothing arrives', async () => {
    const waiting = sync.waitForEvent('/never', { timeoutMs: 20 });
    await expect(waiting).rejects.toBeInstanceOf(TimeoutError);
    await expect(waiting).rejects.toThrow('Timeout waiting for event: /never');
  });

  test('refuses a second concurrent waiter on one topic', async () => {
    const first = sync.waitForEvent('/cue/done');
    await delay(5);

    await expect(sync.waitForEvent('/cue/done')).rejects.toThrow('Already waiting for event: /cue/done');
    await bus.publish('/cue/done', { cue: 1 });
    await expect(first).resolves.toEqual({ cue: 1 });
  });

  test('an aborted signal cancels the wait', async () => {
    const controller = new AbortController();
    const waiting = sync.waitForEvent('/cue/done', { signal: controller.signal });
    await delay(5);

    controller.abort(new CancellationError('cancelled'));
    await expect(waiting).rejects.toBeInstanceOf(CancellationError);
  });

  test('waitForEvents collects every topic in any order', async () => {
    const waiting = sync.waitForEvents(['/a', '/b', '/a']);
    await delay(5);
    await bus.publish('/b', { from: 'b' });
    await bus.publish('/a', { from: 'a' });

    await expect(waiting).resolves.toEqual({ '/a': { from: 'a' }, '/b': { from: 'b' } });
  });

  test('waitForEvents in order waits for each topic in turn', async () => {
    const waiting = sync.waitForEvents(['/a', '/b'], { inOrder: true, timeoutMs: 500 });
    await delay(5);
    await bus.publish('/a', { step: 1 });
    await delay(5);
    await bus.publish('/b', { step: 2 });

    await expect(waiting).resolves.toEqual({ '/a': { step: 1 }, '/b': { step: 2 } });
  });

  test('waitForEvents fails when one topic times out', async () => {
    const waiting = sync.waitForEvents(['/a', '/never'], { timeoutMs: 30 });
    await bus.publish('/a', {});
    await expect(waiting).rejects.toThrow('Timeout waiting for event: /never');
  });

  test('the replay buffer keeps only the newest events', async () => {
    await sync.watch('/tick');
    for (let n = 1; n <= 5; n++) await bus.publish('/tick', { n });

    expect(sync.getEvents('/tick')).toEqual([{ n: 3 }, { n: 4 }, { n: 5 }]);
    sync.clearEvents(['/tick']);
    expect(sync.getEvents('/tick')).toEqual([]);
  });

  test('cleanup cancels waiters and drops subscriptions', async () => {
    const waiting = sync.waitForEvent('/cue/done');
    await delay(5);
    expect(sync.isSubscribed('/cue/done')).toBe(true);
    expect(bus.listenerCount('/cue/done')).toBe(1);

    sync.cleanup();
    await expect(waiting).rejects.toMatchObject({ reason: 'shutdown' });
    expect(sync.isSubscribed()).toBe(false);
    expect(bus.listenerCount('/cue/done')).toBe(0);
  });
});
