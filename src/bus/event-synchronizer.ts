/**
 * Event synchronizer.
 *
 * Lets a caller wait until an event arrives on the bus. Each topic gets one
 * shared subscription that records events into a bounded replay buffer, so
 * an event published before the wait started still satisfies it. A topic
 * has at most one pending waiter at a time.
 *
 * Usage:
 *   const sync = new EventSynchronizer(bus);
 *   const ended = await sync.waitForEvent(EventTopics.PLAN_ENDED, {
 *     timeoutMs: 2_000,
 *     condition: (p) => p.plan_id === 'p1',
 *   });
 */

import { Clock, Deferred, createDeferred, systemClock, throwIfAborted, withTimeout } from '../clock';
import { DEFAULT_CONFIG, SynchronizerConfig } from '../config';
import { CancellationError, TimeoutError, ValidationError, validationError, waitTimeoutError } from '../domain/errors';
import { Payload } from '../domain/payloads';
import { Logger, describeError, logger as rootLogger } from '../logger';
import { EventBus } from './event-bus';

export type EventCondition = (payload: Payload) => boolean;

export interface WaitOptions {
  timeoutMs?: number;
  condition?: EventCondition;
  signal?: AbortSignal;
}

export interface WaitManyOptions {
  timeoutMs?: number;
  /** Require the topics to arrive in the listed order. */
  inOrder?: boolean;
  signal?: AbortSignal;
}

interface Waiter {
  condition?: EventCondition;
  deferred: Deferred<Payload>;
  /** Events delivered while this waiter was parked. */
  seen: number;
}

interface TopicContext {
  topic: string;
  handler: (payload: Payload) => void;
  events: Payload[];
  waiter?: Waiter;
}

interface Match {
  payload: Payload;
  replayed: boolean;
}

export interface EventSynchronizerOptions {
  config?: Partial<SynchronizerConfig>;
  clock?: Clock;
  logger?: Logger;
}

export class EventSynchronizer {
  readonly config: SynchronizerConfig;
  private contexts = new Map<string, TopicContext>();
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly bus: EventBus, options: EventSynchronizerOptions = {}) {
    this.config = { ...DEFAULT_CONFIG.synchronizer, ...options.config };
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ module: 'event-synchronizer' });
  }

  /**
   * Resolve with the newest buffered event on `topic` that satisfies
   * `condition`, or with the next one to arrive. Events that do not satisfy
   * the condition leave the waiter parked. Throws TimeoutError when nothing
   * matches within `timeoutMs`.
   */
  async waitForEvent(topic: string, options: WaitOptions = {}): Promise<Payload> {
    const match = await this.awaitMatch(topic, options);
    if (!match.replayed) await this.settle(options.signal);
    return match.payload;
  }

  /** Wait for several topics and return the matching payload for each. */
  async waitForEvents(topics: string[], options: WaitManyOptions = {}): Promise<Record<string, Payload>> {
    const timeoutMs = options.timeoutMs ?? this.config.defaultTimeoutMs;
    const results: Record<string, Payload> = {};

    if (options.inOrder) {
      const startedAt = this.clock.now();
      for (const topic of topics) {
        const remaining = timeoutMs - (this.clock.now() - startedAt);
        if (remaining <= 0) {
          throw new TimeoutError(waitTimeoutError(topic, timeoutMs, 0));
        }
        const match = await this.awaitMatch(topic, { timeoutMs: remaining, signal: options.signal });
        results[topic] = match.payload;
      }
    } else {
      const unique = [...new Set(topics)];
      const controller = new AbortController();
      const forwardAbort = () => controller.abort(options.signal?.reason);
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
      try {
        const matches = await Promise.all(
          unique.map((topic) => this.awaitMatch(topic, { timeoutMs, signal: controller.signal })),
        );
        matches.forEach((match, index) => {
          results[unique[index]] = match.payload;
        });
      } catch (err) {
        controller.abort(new CancellationError('cancelled'));
        throw err;
      } finally {
        options.signal?.removeEventListener('abort', forwardAbort);
      }
    }

    await this.settle(options.signal);
    return results;
  }

  /** Subscribe to `topics` now so events arriving before a wait are buffered. */
  async watch(topics: string | string[], signal?: AbortSignal): Promise<void> {
    for (const topic of typeof topics === 'string' ? [topics] : topics) {
      await this.subscribeTopic(topic, signal);
    }
  }

  /** Buffered events for `topic`, oldest first. */
  getEvents(topic: string): Payload[] {
    return [...(this.contexts.get(topic)?.events ?? [])];
  }

  hasReceived(topic: string): boolean {
    return this.getEvents(topic).length > 0;
  }

  /** Empty the replay buffers of `topics`, or of every topic. */
  clearEvents(topics?: string[]): void {
    const targets = topics ?? [...this.contexts.keys()];
    for (const topic of targets) {
      const context = this.contexts.get(topic);
      if (context) context.events = [];
    }
  }

  /** True when every topic given (or at least one, with none given) has a live subscription. */
  isSubscribed(topics?: string | string[]): boolean {
    if (topics === undefined) return this.contexts.size > 0;
    const list = typeof topics === 'string' ? [topics] : topics;
    return list.every((topic) => this.contexts.has(topic));
  }

  /** Cancel pending waiters, drop buffers and unsubscribe from every topic. */
  cleanup(): void {
    for (const context of this.contexts.values()) {
      context.waiter?.deferred.reject(new CancellationError('shutdown'));
      context.waiter = undefined;
      try {
        this.bus.unsubscribe(context.topic, context.handler);
      } catch (err) {
        this.log.warn('Failed to unsubscribe', { topic: context.topic, error: describeError(err) });
      }
    }
    this.contexts.clear();
    this.log.debug('Synchronizer cleaned up');
  }

  private async awaitMatch(topic: string, options: WaitOptions): Promise<Match> {
    const timeoutMs = options.timeoutMs ?? this.config.defaultTimeoutMs;
    const { condition, signal } = options;
    throwIfAborted(signal);

    const context = await this.subscribeTopic(topic, signal);
    if (context.waiter) {
      throw new ValidationError(validationError(`Already waiting for event: ${topic}`, { topic }));
    }

    for (let i = context.events.length - 1; i >= 0; i--) {
      if (this.matches(topic, condition, context.events[i])) {
        this.log.debug('Matched buffered event', { topic });
        return { payload: context.events[i], replayed: true };
      }
    }

    const waiter: Waiter = { condition, deferred: createDeferred<Payload>(), seen: 0 };
    context.waiter = waiter;
    try {
      const payload = await withTimeout(
        waiter.deferred.promise,
        timeoutMs,
        this.clock,
        () => new TimeoutError(waitTimeoutError(topic, timeoutMs, waiter.seen)),
        signal,
      );
      return { payload, replayed: false };
    } finally {
      if (context.waiter === waiter) context.waiter = undefined;
    }
  }

  private async subscribeTopic(topic: string, signal?: AbortSignal): Promise<TopicContext> {
    const existing = this.contexts.get(topic);
    if (existing) return existing;

    const context: TopicContext = {
      topic,
      events: [],
      handler: (payload) => this.record(context, payload),
    };
    this.bus.subscribe(topic, context.handler);
    this.contexts.set(topic, context);
    if (this.config.subscriptionGraceMs > 0) {
      await this.clock.sleep(this.config.subscriptionGraceMs, signal);
    }
    return context;
  }

  private record(context: TopicContext, payload: Payload): void {
    context.events.push(payload);
    if (context.events.length > this.config.maxBufferedEvents) {
      context.events.splice(0, context.events.length - this.config.maxBufferedEvents);
    }

    const waiter = context.waiter;
    if (!waiter) return;
    waiter.seen++;
    if (this.matches(context.topic, waiter.condition, payload)) {
      context.waiter = undefined;
      waiter.deferred.resolve(payload);
    }
  }

  private matches(topic: string, condition: EventCondition | undefined, payload: Payload): boolean {
    if (!condition) return true;
    try {
      return condition(payload);
    } catch (err) {
      this.log.error('Event condition threw', { topic, error: describeError(err) });
      return false;
    }
  }

  private async settle(signal?: AbortSignal): Promise<void> {
    if (this.config.gracePeriodMs > 0) {
      await this.clock.sleep(this.config.gracePeriodMs, signal);
    }
  }
}
