/**
 * Shared test utilities: event recording and polling on real timers.
 */

import { EventBus } from '../src/bus/event-bus';
import { TimelineConfig } from '../src/config';
import { Payload } from '../src/domain/payloads';

export interface RecordedEvent {
  topic: string;
  payload: Payload;
}

/** Subscribe to `topics` and collect every delivered event in arrival order. */
export function recordTopics(bus: EventBus, topics: string[]): RecordedEvent[] {
  const events: RecordedEvent[] = [];
  for (const topic of topics) {
    bus.subscribe(topic, (payload: Payload) => {
      events.push({ topic, payload });
    });
  }
  return events;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Poll until `predicate` holds, failing after `timeoutMs`. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) throw new Error(`Condition not met within ${timeoutMs}ms`);
    await delay(5);
  }
}

/** Timeline settings with the settle delays removed and a short speech bound. */
export const FAST_TIMELINE: TimelineConfig = {
  duckingLevel: 0.3,
  duckingFadeMs: 300,
  duckSettleMs: 0,
  unduckSettleMs: 0,
  speechWaitTimeoutMs: 100,
  speechEndFallback: true,
};
