import {
  CancellationError,
  CoreError,
  HandlerError,
  ValidationError,
  createTypedError,
  handlerTimeoutError,
  isCancellation,
  speechTimeoutError,
  toCancellationError,
  validationError,
  waitTimeoutError,
} from '../../src/domain/errors';

describe('Typed Error Model', () => {
  test('createTypedError produces complete error object', () => {
    const error = createTypedError({
      code: 'TEST.ERROR',
      message: 'test error',
      retryable: true,
      details: { key: 'value' },
      suggestedFixes: [{ type: 'FIX', params: {} }],
    });

    expect(error.code).toBe('TEST.ERROR');
    expect(error.message).toBe('test error');
    expect(error.retryable).toBe(true);
    expect(error.details).toEqual({ key: 'value' });
    expect(error.suggestedFixes).toHaveLength(1);
  });

  test('createTypedError defaults', () => {
    const error = createTypedError({ code: 'X', message: 'y' });
    expect(error.retryable).toBe(false);
    expect(error.suggestedFixes).toEqual([]);
  });

  test('validationError is not retryable', () => {
    const error = validationError('bad field', { field: 'layer' });
    expect(error.code).toBe('VALIDATION.SCHEMA');
    expect(error.retryable).toBe(false);
    expect(error.details).toEqual({ field: 'layer' });
  });

  test('handlerTimeoutError suggests a longer timeout', () => {
    const error = handlerTimeoutError('/eyes/command', 500, 2);
    expect(error.code).toBe('BUS.HANDLER_TIMEOUT');
    expect(error.message).toBe('Handler 2 for /eyes/command exceeded 500ms');
    expect(error.retryable).toBe(true);
    expect(error.suggestedFixes[0]).toEqual({ type: 'INCREASE_TIMEOUT', params: { timeoutMs: 1000 } });
  });

  test('speechTimeoutError carries plan and step', () => {
    const error = speechTimeoutError('show', 'greet', 10_000);
    expect(error.code).toBe('TIMELINE.SPEECH_TIMEOUT');
    expect(error.planId).toBe('show');
    expect(error.stepId).toBe('greet');
    expect(error.message).toBe('Timeout waiting for speech synthesis to complete for step greet');
    expect(error.suggestedFixes[0].params).toEqual({ speechWaitTimeoutMs: 15_000 });
  });

  test('waitTimeoutError counts the events seen', () => {
    expect(waitTimeoutError('/cue', 100, 3).details).toEqual({ topic: '/cue', timeoutMs: 100, eventsSeen: 3 });
  });
});

describe('Error classes', () => {
  test('core errors expose the typed error and its code', () => {
    const error = new ValidationError(validationError('bad'));
    expect(error).toBeInstanceOf(CoreError);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.code).toBe('VALIDATION.SCHEMA');
    expect(error.message).toBe('bad');
  });

  test('handler errors keep their cause', () => {
    const cause = new Error('root');
    const error = new HandlerError(createTypedError({ code: 'BUS.HANDLER_ERROR', message: 'wrapped' }), cause);
    expect(error.cause).toBe(cause);
  });

  test('cancellations carry their reason', () => {
    const error = new CancellationError('preempted');
    expect(error.reason).toBe('preempted');
    expect(error.code).toBe('TASK.CANCELLED');
    expect(error.message).toBe('Task cancelled (preempted)');
    expect(isCancellation(error)).toBe(true);
    expect(isCancellation(new Error('x'))).toBe(false);
  });

  test('toCancellationError keeps cancellations and replaces anything else', () => {
    const original = new CancellationError('restart');
    expect(toCancellationError(original)).toBe(original);
    expect(toCancellationError('stop').reason).toBe('cancelled');
  });
});
