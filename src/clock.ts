/**
 * Time source and async helpers.
 *
 * Everything in the core that waits goes through a Clock so tests and
 * embedders can control timing. Waits take an optional AbortSignal and
 * reject with CancellationError when it fires.
 */

import { CancellationError, toCancellationError } from './domain/errors';

export interface Clock {
  /** Milliseconds on a monotonic-enough scale. */
  now(): number;
  /** Resolve after `ms`; reject with CancellationError if `signal` aborts first. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Clock backed by Date.now() and setTimeout. */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(toCancellationError(signal.reason));
        return;
      }
      const onAbort = () => {
        clearTimeout(timer);
        reject(toCancellationError(signal?.reason));
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, Math.max(0, ms));
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/** Throw if the signal has already fired. */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw toCancellationError(signal.reason);
  }
}

/**
 * Race `work` against a clock timeout.
 *
 * `onTimeout` builds the error thrown when the budget elapses. The timer is
 * released as soon as either side settles.
 */
export async function withTimeout<T>(
  work: Promise<T>,
  timeoutMs: number,
  clock: Clock,
  onTimeout: () => Error,
  signal?: AbortSignal,
): Promise<T> {
  throwIfAborted(signal);
  const timer = new AbortController();
  const forwardAbort = () => timer.abort(signal?.reason);
  signal?.addEventListener('abort', forwardAbort, { once: true });

  const expiry = clock.sleep(timeoutMs, timer.signal).then(() => {
    throw onTimeout();
  });
  const cancelled = new Promise<never>((_resolve, reject) => {
    timer.signal.addEventListener('abort', () => {
      if (signal?.aborted) reject(toCancellationError(signal.reason));
    }, { once: true });
  });

  try {
    return await Promise.race([work, expiry, cancelled]);
  } finally {
    signal?.removeEventListener('abort', forwardAbort);
    timer.abort(new CancellationError('cancelled'));
  }
}

/** A promise with its settle functions exposed. */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
  readonly settled: boolean;
}

export function createDeferred<T>(): Deferred<T> {
  let settled = false;
  let resolveFn: (value: T) => void = () => undefined;
  let rejectFn: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((resolve, reject) => {
    resolveFn = resolve;
    rejectFn = reject;
  });
  return {
    promise,
    resolve: (value) => {
      if (settled) return;
      settled = true;
      resolveFn(value);
    },
    reject: (reason) => {
      if (settled) return;
      settled = true;
      rejectFn(reason);
    },
    get settled() {
      return settled;
    },
  };
}
