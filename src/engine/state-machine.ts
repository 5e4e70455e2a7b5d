/**
 * Service and transaction state machines.
 *
 * Enforces valid state transitions for service lifecycles and
 * transactions, producing typed errors on invalid transitions.
 */

import { ServiceStatus, VALID_SERVICE_TRANSITIONS } from '../domain/service';
import { TransactionState, VALID_TRANSACTION_TRANSITIONS } from '../domain/transaction';
import { TypedError, createTypedError } from '../domain/errors';

/** Result of a state transition attempt. */
export interface TransitionResult<S> {
  success: boolean;
  newStatus?: S;
  error?: TypedError;
}

/** Attempt a service lifecycle transition. */
export function transitionServiceStatus(
  current: ServiceStatus,
  target: ServiceStatus,
): TransitionResult<ServiceStatus> {
  const validTargets = VALID_SERVICE_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'SERVICE.INVALID_TRANSITION',
        message: `Invalid service state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Attempt a transaction state transition. */
export function transitionTransactionState(
  current: TransactionState,
  target: TransactionState,
): TransitionResult<TransactionState> {
  const validTargets = VALID_TRANSACTION_TRANSITIONS[current];
  if (!validTargets.includes(target)) {
    return {
      success: false,
      error: createTypedError({
        code: 'TRANSACTION.INVALID_TRANSITION',
        message: `Invalid transaction state transition: ${current} -> ${target}`,
        retryable: false,
        details: { current, target, validTargets },
      }),
    };
  }
  return { success: true, newStatus: target };
}

/** Check if a transaction state is terminal. */
export function isTerminalTransactionState(state: TransactionState): boolean {
  return state === TransactionState.Committed || state === TransactionState.RolledBack;
}

/** Check if a service is active (accepting work or about to). */
export function isActiveServiceStatus(status: ServiceStatus): boolean {
  return status === ServiceStatus.Starting || status === ServiceStatus.Running;
}
