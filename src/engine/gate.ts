/**
 * Open/closed barrier for a layer's step loop.
 *
 * While closed, `wait()` parks until `open()` is called or the caller's
 * signal aborts. Opening releases every parked waiter.
 */

import { createDeferred, Deferred, throwIfAborted } from '../clock';
import { toCancellationError } from '../domain/errors';

export class Gate {
  private opened: Deferred<void> | undefined;

  constructor(initiallyOpen = true) {
    if (!initiallyOpen) this.close();
  }

  isOpen(): boolean {
    return this.opened === undefined;
  }

  close(): void {
    if (!this.opened) this.opened = createDeferred<void>();
  }

  open(): void {
    const pending = this.opened;
    this.opened = undefined;
    pending?.resolve();
  }

  async wait(signal?: AbortSignal): Promise<void> {
    throwIfAborted(signal);
    const pending = this.opened;
    if (!pending) return;

    const cancelled = createDeferred<void>();
    const onAbort = () => cancelled.reject(toCancellationError(signal?.reason));
    signal?.addEventListener('abort', onAbort, { once: true });
    try {
      await Promise.race([pending.promise, cancelled.promise]);
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
