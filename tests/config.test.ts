import { DEFAULT_CONFIG, loadConfig, mergeConfig, readEnvOverrides, validateConfig } from '../src/config';
import { ValidationError } from '../src/domain/errors';
import { LogLevel } from '../src/logger';

describe('Configuration', () => {
  test('defaults apply when nothing is set', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
    expect(validateConfig(mergeConfig(DEFAULT_CONFIG))).toEqual({ valid: true, errors: [], warnings: [] });
  });

  test('environment variables override defaults', () => {
    const config = loadConfig({
      CUEBUS_HANDLER_TIMEOUT_MS: '250',
      CUEBUS_PROPAGATE_HANDLER_ERRORS: 'yes',
      CUEBUS_LOG_LEVEL: 'WARNING',
      CUEBUS_DUCKING_LEVEL: '0.5',
    });

    expect(config.bus.handlerTimeoutMs).toBe(250);
    expect(config.bus.propagateErrors).toBe(true);
    expect(config.bus.verifyTimeoutMs).toBe(1_000);
    expect(config.logLevel).toBe(LogLevel.Warn);
    expect(config.timeline.duckingLevel).toBe(0.5);
    expect(config.timeline.duckingFadeMs).toBe(300);
  });

  test('explicit overrides win over the environment', () => {
    const config = loadConfig(
      { CUEBUS_HANDLER_TIMEOUT_MS: '250' },
      { bus: { handlerTimeoutMs: 400 }, shutdownTimeoutMs: 50 },
    );
    expect(config.bus.handlerTimeoutMs).toBe(400);
    expect(config.shutdownTimeoutMs).toBe(50);
  });

  test('blank variables are ignored', () => {
    expect(readEnvOverrides({ CUEBUS_HANDLER_TIMEOUT_MS: '  ', CUEBUS_LOG_LEVEL: '' })).toEqual({
      bus: {},
      transaction: {},
      synchronizer: {},
      timeline: {},
      health: {},
    });
  });

  test('unparseable variables are reported together', () => {
    const load = () =>
      loadConfig({
        CUEBUS_SYNC_TIMEOUT_MS: 'soon',
        CUEBUS_PROPAGATE_HANDLER_ERRORS: 'maybe',
        CUEBUS_LOG_LEVEL: 'loud',
      });

    expect(load).toThrow(ValidationError);
    expect(load).toThrow(
      'Invalid configuration: CUEBUS_PROPAGATE_HANDLER_ERRORS must be a boolean, got "maybe"; ' +
        'CUEBUS_SYNC_TIMEOUT_MS must be a number, got "soon"; ' +
        'CUEBUS_LOG_LEVEL must be one of debug, info, warn, error, got "loud"',
    );
  });

  test('the error carries a CONFIG code and the problem list', () => {
    try {
      loadConfig({}, { timeline: { duckingLevel: 1.5 } });
      throw new Error('expected loadConfig to throw');
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      expect(err).toMatchObject({
        typedError: {
          code: 'CONFIG.INVALID',
          details: { errors: ['timeline.duckingLevel must be between 0.0 and 1.0, got 1.5'] },
        },
      });
    }
  });

  test('validateConfig checks ranges', () => {
    const result = validateConfig(
      mergeConfig(DEFAULT_CONFIG, { bus: { handlerTimeoutMs: 0 }, synchronizer: { maxBufferedEvents: 0, gracePeriodMs: -1 } }),
    );
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'synchronizer.gracePeriodMs must be >= 0, got -1',
      'bus.handlerTimeoutMs must be greater than 0',
      'synchronizer.maxBufferedEvents must be >= 1, got 0',
    ]);
  });

  test('validateConfig warns about noisy or lopsided settings', () => {
    const result = validateConfig(
      mergeConfig(DEFAULT_CONFIG, { health: { periodicEmissionMs: 500 }, timeline: { speechWaitTimeoutMs: 60_000 } }),
    );
    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([
      'timeline.speechWaitTimeoutMs is much longer than bus.handlerTimeoutMs; stalled speech will hold the layer for a long time',
      'health.periodicEmissionMs below 1000ms will flood SERVICE_STATUS_UPDATE',
    ]);
  });

  test('mergeConfig does not mutate the base', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { timeline: { duckSettleMs: 0 } });
    expect(merged.timeline.duckSettleMs).toBe(0);
    expect(DEFAULT_CONFIG.timeline.duckSettleMs).toBe(150);
  });
});
