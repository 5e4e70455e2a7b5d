/**
 * Background task ownership.
 *
 * Every long-running piece of work (a plan's step loop, periodic status
 * emission) is spawned here with its own AbortController. The supervisor
 * keeps the task until it settles, logs failures other than cancellation,
 * and can cancel or join everything it owns.
 */

import { v4 as uuid } from 'uuid';
import { Clock, systemClock } from '../clock';
import { CancellationError, CancellationReason, isCancellation } from '../domain/errors';
import { Logger, describeError, logger as rootLogger } from '../logger';

export type TaskOutcome = 'completed' | 'cancelled' | 'failed';

export interface SupervisedTask {
  readonly id: string;
  readonly name: string;
  readonly signal: AbortSignal;
  /** Settles when the task does; never rejects. */
  readonly done: Promise<TaskOutcome>;
  cancel(reason?: CancellationReason): void;
}

export class TaskSupervisor {
  private tasks = new Map<string, SupervisedTask>();
  private readonly log: Logger;
  private readonly clock: Clock;

  constructor(options: { logger?: Logger; clock?: Clock } = {}) {
    this.log = (options.logger ?? rootLogger).child({ module: 'task-supervisor' });
    this.clock = options.clock ?? systemClock;
  }

  /** Track `run` until it settles. It starts after `spawn` returns. */
  spawn(name: string, run: (signal: AbortSignal) => Promise<void>): SupervisedTask {
    const id = uuid();
    const controller = new AbortController();

    // Start on the next microtask so the caller can record the task first.
    const done = Promise.resolve().then(() => run(controller.signal)).then(
      (): TaskOutcome => 'completed',
      (err: unknown): TaskOutcome => {
        if (isCancellation(err)) {
          this.log.debug('Task cancelled', { taskId: id, task: name, reason: err.reason });
          return 'cancelled';
        }
        this.log.error('Task failed', { taskId: id, task: name, error: describeError(err) });
        return 'failed';
      },
    ).finally(() => {
      this.tasks.delete(id);
    });

    const task: SupervisedTask = {
      id,
      name,
      signal: controller.signal,
      done,
      cancel: (reason: CancellationReason = 'cancelled') => {
        if (!controller.signal.aborted) controller.abort(new CancellationError(reason));
      },
    };
    this.tasks.set(id, task);
    this.log.debug('Task spawned', { taskId: id, task: name });
    return task;
  }

  get size(): number {
    return this.tasks.size;
  }

  list(): SupervisedTask[] {
    return [...this.tasks.values()];
  }

  cancelAll(reason: CancellationReason = 'cancelled'): void {
    for (const task of this.tasks.values()) task.cancel(reason);
  }

  /**
   * Wait for every owned task to settle. Returns false if some were still
   * running when `timeoutMs` elapsed.
   */
  async join(timeoutMs?: number): Promise<boolean> {
    const pending = Promise.all(this.list().map((task) => task.done)).then(() => true);
    if (timeoutMs === undefined) return pending;

    const timer = new AbortController();
    const expired = this.clock.sleep(timeoutMs, timer.signal).then(
      () => false,
      () => false,
    );
    try {
      const joined = await Promise.race([pending, expired]);
      if (!joined) this.log.warn('Tasks still running after join timeout', { remaining: this.size, timeoutMs });
      return joined;
    } finally {
      timer.abort();
    }
  }

  /** Cancel everything and wait for it to settle. */
  async shutdown(timeoutMs?: number): Promise<boolean> {
    this.cancelAll('shutdown');
    return this.join(timeoutMs);
  }
}
