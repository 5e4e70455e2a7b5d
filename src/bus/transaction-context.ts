/**
 * Transactional event emission.
 *
 * A TransactionContext publishes events as one unit. Each emission can
 * register a compensating action; rollback runs them newest first. State
 * changes go through the transaction state machine.
 *
 * Usage:
 *   await runInTransaction(bus, async (tx) => {
 *     await tx.emit(EventTopics.AUDIO_DUCKING_START, { level: 0.3, fade_ms: 300 }, () => bus.publish(...));
 *     await tx.emit(EventTopics.TTS_GENERATE_REQUEST, request);
 *   });
 */

import { v4 as uuid } from 'uuid';
import { Clock, systemClock } from '../clock';
import { DEFAULT_CONFIG, TransactionConfig } from '../config';
import { CompensatingAction, EventRecord, TransactionState } from '../domain/transaction';
import { TransactionError, createTypedError, transactionStateError } from '../domain/errors';
import { PayloadFor, isPayload } from '../domain/payloads';
import { transitionTransactionState } from '../engine/state-machine';
import { Logger, describeError, logger as rootLogger } from '../logger';
import { EventBus } from './event-bus';

export interface TransactionOptions {
  config?: Partial<TransactionConfig>;
  clock?: Clock;
  logger?: Logger;
}

export class TransactionContext {
  readonly id = uuid();
  readonly config: TransactionConfig;
  private _state = TransactionState.Pending;
  private events: EventRecord[] = [];
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(private readonly bus: EventBus, options: TransactionOptions = {}) {
    this.config = { ...DEFAULT_CONFIG.transaction, ...options.config };
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ module: 'transaction', transactionId: this.id });
  }

  get state(): TransactionState {
    return this._state;
  }

  /** Events emitted so far, oldest first. */
  get records(): readonly EventRecord[] {
    return this.events;
  }

  /** Publish an event as part of this transaction. */
  async emit<T extends string>(topic: T, payload: PayloadFor<T>, compensatingAction?: CompensatingAction): Promise<void> {
    if (this._state !== TransactionState.Pending) {
      throw new TransactionError(transactionStateError('emit in', this._state));
    }
    const body: unknown = payload;
    this.events.push({
      topic,
      payload: isPayload(body) ? { ...body } : {},
      timestamp: this.clock.now(),
      compensatingAction,
    });
    await this.bus.publish(topic, payload);
    await this.clock.sleep(this.config.gracePeriodMs);
  }

  async commit(): Promise<void> {
    if (this._state !== TransactionState.Pending) {
      throw new TransactionError(transactionStateError('commit', this._state));
    }
    this.moveTo(TransactionState.Committing);
    try {
      await this.clock.sleep(this.config.gracePeriodMs);
      this.moveTo(TransactionState.Committed);
      this.log.debug('Transaction committed', { events: this.events.length });
    } catch (err) {
      this.moveTo(TransactionState.Failed);
      throw new TransactionError(
        createTypedError({
          code: 'TRANSACTION.COMMIT_FAILED',
          message: `Commit failed: ${describeError(err)}`,
          details: { transactionId: this.id },
        }),
        err,
      );
    }
  }

  /**
   * Run compensating actions newest first. A failing compensator is logged
   * and the rest still run.
   */
  async rollback(): Promise<void> {
    if (this._state !== TransactionState.Pending && this._state !== TransactionState.Failed) {
      throw new TransactionError(transactionStateError('rollback', this._state));
    }
    this.moveTo(TransactionState.RollingBack);
    try {
      const compensators = this.events
        .map((record) => ({ topic: record.topic, action: record.compensatingAction }))
        .reverse();
      let failures = 0;
      for (const { topic, action } of compensators) {
        if (!action) continue;
        try {
          await action();
          await this.clock.sleep(this.config.gracePeriodMs);
        } catch (err) {
          failures++;
          this.log.error('Compensating action failed', { topic, error: describeError(err) });
        }
      }
      this.moveTo(TransactionState.RolledBack);
      this.log.info('Transaction rolled back', { events: this.events.length, failures });
    } catch (err) {
      this.moveTo(TransactionState.Failed);
      throw new TransactionError(
        createTypedError({
          code: 'TRANSACTION.ROLLBACK_FAILED',
          message: `Rollback failed: ${describeError(err)}`,
          details: { transactionId: this.id },
        }),
        err,
      );
    }
  }

  private moveTo(target: TransactionState): void {
    const result = transitionTransactionState(this._state, target);
    if (!result.success || !result.newStatus) {
      throw new TransactionError(
        result.error ?? transactionStateError(`move to ${target} from`, this._state),
      );
    }
    this._state = result.newStatus;
  }
}

/**
 * Run `work` inside a transaction: commit when it returns, roll back and
 * re-throw when it throws.
 */
export async function runInTransaction<R>(
  bus: EventBus,
  work: (tx: TransactionContext) => Promise<R>,
  options: TransactionOptions = {},
): Promise<R> {
  const tx = new TransactionContext(bus, options);
  let result: R;
  try {
    result = await work(tx);
  } catch (err) {
    if (tx.state === TransactionState.Pending || tx.state === TransactionState.Failed) {
      await tx.rollback();
    }
    throw err;
  }
  if (tx.state === TransactionState.Pending) {
    await tx.commit();
  }
  return result;
}
