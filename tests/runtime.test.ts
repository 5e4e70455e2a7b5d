import { DEFAULT_CONFIG, mergeConfig } from '../src/config';
import { ServiceStatus } from '../src/domain/service';
import { EventTopics } from '../src/domain/topics';
import { CoreContext, createCoreContext, shutdownCore, startCore } from '../src/runtime';
import { SpeechLoopback } from '../src/services/speech-loopback';

const FAST_CONFIG = mergeConfig(DEFAULT_CONFIG, {
  synchronizer: { gracePeriodMs: 0, subscriptionGraceMs: 0 },
  timeline: { duckSettleMs: 0, unduckSettleMs: 0, speechWaitTimeoutMs: 500 },
  shutdownTimeoutMs: 500,
});

describe('Core runtime', () => {
  let context: CoreContext;

  beforeEach(async () => {
    context = createCoreContext({ config: FAST_CONFIG });
    context.services.register(new SpeechLoopback({ bus: context.bus, latencyMs: 5 }));
    await startCore(context);
  });

  afterEach(async () => {
    await shutdownCore(context);
  });

  test('starts every service and records them as ready', () => {
    expect(context.services.list().map((service) => service.name)).toEqual([
      'status_monitor',
      'timeline_executor',
      'speech_loopback',
    ]);
    for (const name of ['status_monitor', 'timeline_executor', 'speech_loopback']) {
      expect(context.statusMonitor.getStatus(name)).toMatchObject({ status: ServiceStatus.Running, ready: true });
    }
  });

  test('every subscribed topic passes verification', async () => {
    await expect(context.services.verifyWiring(200)).resolves.toBeUndefined();
  });

  test('runs a spoken plan end to end', async () => {
    const { synchronizer, executor } = context;
    await synchronizer.watch([EventTopics.PLAN_ENDED]);

    await executor.submitPlan({
      plan_id: 'show',
      layer: 'foreground',
      steps: [
        { id: 'greet', type: 'speak', text: 'Good evening' },
        { id: 'spin', type: 'move', motion: 'spin' },
      ],
    });

    const ended = await synchronizer.waitForEvent(EventTopics.PLAN_ENDED, {
      timeoutMs: 2_000,
      condition: (payload) => payload.plan_id === 'show',
    });
    expect(ended).toEqual({ plan_id: 'show', layer: 'foreground', status: 'completed' });
  });

  test('shutdown stops services in reverse and reports no failures', async () => {
    await expect(shutdownCore(context)).resolves.toEqual([]);
    expect(context.executor.status).toBe(ServiceStatus.Stopped);
    expect(context.synchronizer.isSubscribed()).toBe(false);
  });
});
