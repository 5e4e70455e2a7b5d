/**
 * Transaction domain model.
 *
 * A transaction groups bus emissions as one unit. Each emission may carry
 * a compensating action that undoes it during rollback.
 */

import { Payload } from './payloads';

export enum TransactionState {
  Pending = 'PENDING',
  Committing = 'COMMITTING',
  Committed = 'COMMITTED',
  RollingBack = 'ROLLING_BACK',
  RolledBack = 'ROLLED_BACK',
  Failed = 'FAILED',
}

export const VALID_TRANSACTION_TRANSITIONS: Record<TransactionState, TransactionState[]> = {
  [TransactionState.Pending]: [TransactionState.Committing, TransactionState.RollingBack],
  [TransactionState.Committing]: [TransactionState.Committed, TransactionState.Failed],
  [TransactionState.Committed]: [],
  [TransactionState.RollingBack]: [TransactionState.RolledBack, TransactionState.Failed],
  [TransactionState.RolledBack]: [],
  [TransactionState.Failed]: [TransactionState.RollingBack],
};

export type CompensatingAction = () => void | Promise<void>;

export interface EventRecord {
  topic: string;
  payload: Payload;
  /** Clock time (ms) when the event was recorded. */
  timestamp: number;
  compensatingAction?: CompensatingAction;
}
