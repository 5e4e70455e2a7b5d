/**
 * In-process publish/subscribe bus.
 *
 * Handlers are keyed by (topic, handler) identity, so subscribing the same
 * function twice is a no-op. A publish validates the payload against the
 * topic schema, then runs the current listeners one after another in
 * registration order, each bounded by a timeout. A failing or slow handler
 * never stops delivery to the ones after it.
 *
 * Usage:
 *   const bus = new EventBus();
 *   bus.subscribe(EventTopics.PLAN_ENDED, (p) => console.log(p.status));
 *   await bus.publish(EventTopics.PLAN_ENDED, { plan_id: 'p1', layer: Layer.Ambient, status: 'completed' });
 */

import { v4 as uuid } from 'uuid';
import { Clock, createDeferred, systemClock, withTimeout } from '../clock';
import { BusConfig, DEFAULT_CONFIG } from '../config';
import {
  HandlerError,
  TimeoutError,
  ValidationError,
  handlerFailedError,
  handlerTimeoutError,
  invalidTopicError,
  validationError,
  verificationTimeoutError,
} from '../domain/errors';
import { EventHandler, PROBE_FLAG, Payload, PayloadFor, isPayload, isProbe } from '../domain/payloads';
import { Logger, describeError, logger as rootLogger } from '../logger';
import { SchemaRegistry } from './schema-registry';

/** Identity key for a registered handler, whatever payload type it declares. */
export type AnyHandler = (payload: never) => unknown;

export type SubscriptionOrigin = 'internal' | 'external';

export interface SubscriptionInfo {
  topic: string;
  handler: AnyHandler;
  origin: SubscriptionOrigin;
  registeredAt: number;
}

interface Registration {
  info: SubscriptionInfo;
  invoke(payload: Payload): Promise<void>;
}

export interface EventBusOptions {
  config?: Partial<BusConfig>;
  clock?: Clock;
  schemas?: SchemaRegistry;
  logger?: Logger;
}

export class EventBus {
  readonly config: BusConfig;
  readonly schemas: SchemaRegistry;
  private readonly clock: Clock;
  private readonly log: Logger;
  private registry = new Map<string, Map<AnyHandler, Registration>>();

  constructor(options: EventBusOptions = {}) {
    this.config = { ...DEFAULT_CONFIG.bus, ...options.config };
    this.schemas = options.schemas ?? new SchemaRegistry();
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ module: 'event-bus' });
  }

  /**
   * Register `handler` for `topic`. Internal handlers also receive
   * verification probes on topics whose schema the probe satisfies.
   */
  subscribe<T extends string>(topic: T, handler: EventHandler<PayloadFor<T>>, internal = false): void {
    this.assertTopic(topic);
    if (typeof handler !== 'function') {
      throw new ValidationError(validationError('Handler must be a function', { topic }));
    }
    if (handler.length > 1) {
      throw new ValidationError(
        validationError(`Handler must accept a single payload argument, got ${handler.length}`, { topic }),
      );
    }

    let handlers = this.registry.get(topic);
    if (!handlers) {
      handlers = new Map();
      this.registry.set(topic, handlers);
    }
    if (handlers.has(handler)) {
      this.log.debug('Handler already subscribed', { topic });
      return;
    }

    const origin: SubscriptionOrigin = internal ? 'internal' : 'external';
    const invoke = async (payload: Payload): Promise<void> => {
      if (isProbe(payload) && origin === 'external') return;
      if (!this.schemas.conforms(topic, payload)) {
        this.log.debug('Skipping payload that does not match the topic schema', { topic });
        return;
      }
      await handler(payload);
    };

    handlers.set(handler, {
      info: { topic, handler, origin, registeredAt: this.clock.now() },
      invoke,
    });
    this.log.debug('Subscribed', { topic, origin, listeners: handlers.size });
  }

  /** Remove one registration. Returns false when it was not registered. */
  unsubscribe(topic: string, handler: AnyHandler): boolean {
    const handlers = this.registry.get(topic);
    if (!handlers || !handlers.delete(handler)) {
      this.log.debug('Unsubscribe for unknown handler', { topic });
      return false;
    }
    if (handlers.size === 0) this.registry.delete(topic);
    this.log.debug('Unsubscribed', { topic });
    return true;
  }

  /** Remove every registration for `topic`, or for all topics. */
  unsubscribeAll(topic?: string): void {
    if (topic === undefined) {
      this.registry.clear();
    } else {
      this.registry.delete(topic);
    }
  }

  /**
   * Deliver `payload` to every current listener of `topic`.
   *
   * Throws ValidationError for a bad topic or payload. Handler failures are
   * logged and skipped unless `propagateErrors` is set, in which case the
   * first one is re-thrown as HandlerError. A handler exceeding `timeoutMs`
   * is logged and skipped.
   */
  async publish<T extends string>(
    topic: T,
    payload?: PayloadFor<T>,
    timeoutMs: number = this.config.handlerTimeoutMs,
  ): Promise<void> {
    this.assertTopic(topic);
    const body: unknown = payload ?? {};
    if (!isPayload(body)) {
      throw new ValidationError(validationError(`Payload for ${topic} must be an object`, { topic }));
    }
    if (!isProbe(body)) {
      const problems = this.schemas.validate(topic, body);
      if (problems.length > 0) {
        throw new ValidationError(
          validationError(`Invalid payload for ${topic}: ${problems.join('; ')}`, { topic, problems }),
        );
      }
    }

    const listeners = [...(this.registry.get(topic)?.values() ?? [])];
    for (const [index, registration] of listeners.entries()) {
      try {
        await withTimeout(
          registration.invoke(body),
          timeoutMs,
          this.clock,
          () => new TimeoutError(handlerTimeoutError(topic, timeoutMs, index)),
        );
      } catch (err) {
        if (err instanceof TimeoutError) {
          this.log.warn('Handler timed out', { topic, handlerIndex: index, timeoutMs });
          continue;
        }
        if (this.config.propagateErrors) {
          throw new HandlerError(handlerFailedError(topic, index, err), err);
        }
        this.log.error('Handler failed', { topic, handlerIndex: index, error: describeError(err) });
      }
    }
  }

  /**
   * Check that an event published on `topic` is delivered through the bus.
   * Throws TimeoutError when the probe does not arrive within the bound.
   */
  async verify(topic: string, timeoutMs: number = this.config.verifyTimeoutMs): Promise<void> {
    this.assertTopic(topic);
    const probeId = uuid();
    const delivered = createDeferred<void>();
    const listener = (payload: Payload): void => {
      if (payload.probe_id === probeId) delivered.resolve();
    };

    let handlers = this.registry.get(topic);
    if (!handlers) {
      handlers = new Map();
      this.registry.set(topic, handlers);
    }
    handlers.set(listener, {
      info: { topic, handler: listener, origin: 'internal', registeredAt: this.clock.now() },
      invoke: async (payload) => listener(payload),
    });

    try {
      const probe: Payload = { [PROBE_FLAG]: true, probe_id: probeId };
      const delivery = this.publish(topic, probe, timeoutMs).then(() => delivered.promise);
      await withTimeout(delivery, timeoutMs, this.clock, () => new TimeoutError(verificationTimeoutError(topic, timeoutMs)));
      this.log.debug('Verified topic', { topic });
    } finally {
      this.unsubscribe(topic, listener);
    }
  }

  /** Probe every subscribed topic. Failures are logged and reported as false. */
  async verifyAll(timeoutMs: number = this.config.verifyTimeoutMs): Promise<Record<string, boolean>> {
    const results: Record<string, boolean> = {};
    for (const topic of this.topics()) {
      try {
        await this.verify(topic, timeoutMs);
        results[topic] = true;
      } catch (err) {
        this.log.warn('Topic verification failed', { topic, error: describeError(err) });
        results[topic] = false;
      }
    }
    return results;
  }

  listenerCount(topic: string): number {
    return this.registry.get(topic)?.size ?? 0;
  }

  topics(): string[] {
    return [...this.registry.keys()];
  }

  subscriptions(topic?: string): SubscriptionInfo[] {
    const maps = topic === undefined ? [...this.registry.values()] : [this.registry.get(topic) ?? new Map<AnyHandler, Registration>()];
    return maps.flatMap((handlers) => [...handlers.values()].map((registration) => ({ ...registration.info })));
  }

  private assertTopic(topic: unknown): void {
    if (typeof topic !== 'string' || topic.trim() === '') {
      throw new ValidationError(invalidTopicError(topic));
    }
  }
}
