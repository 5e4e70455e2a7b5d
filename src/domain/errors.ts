/**
 * Typed error model.
 *
 * Every failure the core reports carries a namespaced code, a message and
 * structured details so that bus peers (dashboards, CLI, tests) can act on
 * it without parsing strings. The thrown classes below wrap a TypedError;
 * asynchronous failures are reported as SERVICE_STATUS_UPDATE events built
 * from the same structure.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'VALIDATION'
  | 'BUS'
  | 'SERVICE'
  | 'TRANSACTION'
  | 'SYNC'
  | 'TIMELINE'
  | 'TASK'
  | 'CONFIG';

/** Typed suggested fix a caller can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure. */
export interface TypedError {
  /** Namespaced error code (e.g., "TIMELINE.SPEECH_TIMEOUT"). */
  code: string;
  message: string;
  /** Associated plan if applicable. */
  planId?: string;
  /** Associated step if applicable. */
  stepId?: string;
  /** Whether the same operation is expected to succeed without changes. */
  retryable: boolean;
  details?: Record<string, unknown>;
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  planId?: string;
  stepId?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    planId: params.planId,
    stepId: params.stepId,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Base class for every error the core throws. */
export class CoreError extends Error {
  constructor(public readonly typedError: TypedError, options?: { cause?: unknown }) {
    super(typedError.message, options);
    this.name = 'CoreError';
  }

  get code(): string {
    return this.typedError.code;
  }
}

/** Unknown layer, malformed step, bad topic, malformed payload. */
export class ValidationError extends CoreError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ValidationError';
  }
}

/** A subscriber threw while handling an event (only surfaced when propagation is enabled). */
export class HandlerError extends CoreError {
  constructor(typedError: TypedError, cause?: unknown) {
    super(typedError, { cause });
    this.name = 'HandlerError';
  }
}

/** A bounded wait elapsed. */
export class TimeoutError extends CoreError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'TimeoutError';
  }
}

/** Why a cooperative task was told to stop. */
export type CancellationReason = 'cancelled' | 'preempted' | 'restart' | 'shutdown';

/** Raised inside a task whose AbortSignal fired. Always re-thrown after local cleanup. */
export class CancellationError extends CoreError {
  constructor(public readonly reason: CancellationReason = 'cancelled') {
    super(
      createTypedError({
        code: 'TASK.CANCELLED',
        message: `Task cancelled (${reason})`,
        details: { reason },
      }),
    );
    this.name = 'CancellationError';
  }
}

/** Transaction used in the wrong state, or its commit/rollback failed. */
export class TransactionError extends CoreError {
  constructor(typedError: TypedError, cause?: unknown) {
    super(typedError, { cause });
    this.name = 'TransactionError';
  }
}

/** Invalid service lifecycle usage. */
export class LifecycleError extends CoreError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'LifecycleError';
  }
}

/** Normalise an abort reason into a CancellationError. */
export function toCancellationError(reason: unknown): CancellationError {
  return reason instanceof CancellationError ? reason : new CancellationError('cancelled');
}

export function isCancellation(err: unknown): err is CancellationError {
  return err instanceof CancellationError;
}

// --- Common error factory functions ---

export function validationError(
  message: string,
  details?: Record<string, unknown>,
  fixes?: SuggestedFix[],
): TypedError {
  return createTypedError({
    code: 'VALIDATION.SCHEMA',
    message,
    retryable: false,
    details,
    suggestedFixes: fixes,
  });
}

export function invalidTopicError(topic: unknown): TypedError {
  return createTypedError({
    code: 'VALIDATION.TOPIC',
    message: 'Topic must be a non-empty string',
    details: { topic: String(topic) },
  });
}

export function handlerTimeoutError(topic: string, timeoutMs: number, handlerIndex: number): TypedError {
  return createTypedError({
    code: 'BUS.HANDLER_TIMEOUT',
    message: `Handler ${handlerIndex} for ${topic} exceeded ${timeoutMs}ms`,
    retryable: true,
    details: { topic, timeoutMs, handlerIndex },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } },
    ],
  });
}

export function handlerFailedError(topic: string, handlerIndex: number, cause: unknown): TypedError {
  return createTypedError({
    code: 'BUS.HANDLER_ERROR',
    message: `Handler ${handlerIndex} for ${topic} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
    details: { topic, handlerIndex },
  });
}

export function verificationTimeoutError(topic: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'BUS.VERIFICATION_TIMEOUT',
    message: `Probe on ${topic} was not delivered within ${timeoutMs}ms`,
    retryable: true,
    details: { topic, timeoutMs },
    suggestedFixes: [
      { type: 'CHECK_WIRING', params: { topic }, description: `Check the subscribers of "${topic}"` },
    ],
  });
}

export function waitTimeoutError(topic: string, timeoutMs: number, seen: number): TypedError {
  return createTypedError({
    code: 'SYNC.TIMEOUT',
    message: `Timeout waiting for event: ${topic}`,
    retryable: true,
    details: { topic, timeoutMs, eventsSeen: seen },
  });
}

export function speechTimeoutError(planId: string, stepId: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: 'TIMELINE.SPEECH_TIMEOUT',
    message: `Timeout waiting for speech synthesis to complete for step ${stepId}`,
    planId,
    stepId,
    retryable: true,
    details: { timeoutMs },
    suggestedFixes: [
      { type: 'INCREASE_TIMEOUT', params: { speechWaitTimeoutMs: timeoutMs * 1.5 } },
    ],
  });
}

export function transactionStateError(operation: string, state: string): TypedError {
  return createTypedError({
    code: 'TRANSACTION.INVALID_STATE',
    message: `Cannot ${operation} transaction in ${state} state`,
    details: { operation, state },
  });
}

export function lifecycleTransitionError(service: string, from: string, to: string): TypedError {
  return createTypedError({
    code: 'SERVICE.INVALID_TRANSITION',
    message: `Invalid service state transition for ${service}: ${from} -> ${to}`,
    details: { service, from, to },
  });
}
