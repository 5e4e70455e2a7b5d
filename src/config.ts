/**
 * Runtime configuration.
 *
 * Defaults, overlaid with CUEBUS_* environment variables, overlaid with
 * explicit overrides. `loadConfig` validates the result and throws a
 * ValidationError listing every problem.
 *
 * Usage:
 *   const config = loadConfig(process.env, { timeline: { speechWaitTimeoutMs: 15_000 } });
 *   setLogLevel(config.logLevel);
 */

import { ValidationError, createTypedError } from './domain/errors';
import { HealthConfig, DEFAULT_HEALTH_CONFIG } from './domain/service';
import { LogLevel, parseLogLevel } from './logger';

export interface BusConfig {
  /** Per-handler bound for one publish call. */
  handlerTimeoutMs: number;
  /** Re-throw subscriber errors out of publish instead of logging them. */
  propagateErrors: boolean;
  /** Bound for a verification probe. */
  verifyTimeoutMs: number;
}

export interface TransactionConfig {
  /** Settle delay after each transactional emission. */
  gracePeriodMs: number;
}

export interface SynchronizerConfig {
  /** Settle delay after a matched event before the waiter resumes. */
  gracePeriodMs: number;
  /** Settle delay after a new topic subscription. */
  subscriptionGraceMs: number;
  defaultTimeoutMs: number;
  /** Replay buffer size per topic. */
  maxBufferedEvents: number;
}

export interface TimelineConfig {
  /** Target music level while ducked (0.0-1.0). */
  duckingLevel: number;
  duckingFadeMs: number;
  /** Settle delay between ducking start and the TTS request. */
  duckSettleMs: number;
  /** Settle delay between speech completion and ducking stop. */
  unduckSettleMs: number;
  speechWaitTimeoutMs: number;
  /** Resolve the oldest speech waiter when an end event matches no clip or step. */
  speechEndFallback: boolean;
}

export interface CoreConfig {
  logLevel: LogLevel;
  bus: BusConfig;
  transaction: TransactionConfig;
  synchronizer: SynchronizerConfig;
  timeline: TimelineConfig;
  health: HealthConfig;
  /** Bound for joining background tasks on shutdown. */
  shutdownTimeoutMs: number;
}

export type ConfigOverrides = {
  [K in keyof CoreConfig]?: CoreConfig[K] extends object ? Partial<CoreConfig[K]> : CoreConfig[K];
};

export const DEFAULT_CONFIG: Readonly<CoreConfig> = {
  logLevel: LogLevel.Info,
  bus: {
    handlerTimeoutMs: 5_000,
    propagateErrors: false,
    verifyTimeoutMs: 1_000,
  },
  transaction: {
    gracePeriodMs: 200,
  },
  synchronizer: {
    gracePeriodMs: 500,
    subscriptionGraceMs: 100,
    defaultTimeoutMs: 10_000,
    maxBufferedEvents: 100,
  },
  timeline: {
    duckingLevel: 0.3,
    duckingFadeMs: 300,
    duckSettleMs: 150,
    unduckSettleMs: 250,
    speechWaitTimeoutMs: 10_000,
    speechEndFallback: true,
  },
  health: { ...DEFAULT_HEALTH_CONFIG },
  shutdownTimeoutMs: 5_000,
};

/** Validation result for a configuration. */
export interface ConfigValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

type Env = Record<string, string | undefined>;

function envNumber(env: Env, key: string, errors: string[]): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    errors.push(`${key} must be a number, got "${raw}"`);
    return undefined;
  }
  return value;
}

function envBoolean(env: Env, key: string, errors: string[]): boolean | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const normalized = raw.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  errors.push(`${key} must be a boolean, got "${raw}"`);
  return undefined;
}

/** Drop unset keys so they do not mask defaults when spread. */
function defined<T extends Record<string, unknown>>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key in values) {
    if (values[key] !== undefined) result[key] = values[key];
  }
  return result;
}

/** Read CUEBUS_* variables into overrides. Unparseable values are reported in `errors`. */
export function readEnvOverrides(env: Env, errors: string[] = []): ConfigOverrides {
  const overrides: ConfigOverrides = {
    bus: defined({
      handlerTimeoutMs: envNumber(env, 'CUEBUS_HANDLER_TIMEOUT_MS', errors),
      propagateErrors: envBoolean(env, 'CUEBUS_PROPAGATE_HANDLER_ERRORS', errors),
      verifyTimeoutMs: envNumber(env, 'CUEBUS_VERIFY_TIMEOUT_MS', errors),
    }),
    transaction: defined({
      gracePeriodMs: envNumber(env, 'CUEBUS_TRANSACTION_GRACE_MS', errors),
    }),
    synchronizer: defined({
      gracePeriodMs: envNumber(env, 'CUEBUS_SYNC_GRACE_MS', errors),
      defaultTimeoutMs: envNumber(env, 'CUEBUS_SYNC_TIMEOUT_MS', errors),
    }),
    timeline: defined({
      duckingLevel: envNumber(env, 'CUEBUS_DUCKING_LEVEL', errors),
      duckingFadeMs: envNumber(env, 'CUEBUS_DUCKING_FADE_MS', errors),
      speechWaitTimeoutMs: envNumber(env, 'CUEBUS_SPEECH_WAIT_TIMEOUT_MS', errors),
    }),
    health: defined({
      periodicEmissionMs: envNumber(env, 'CUEBUS_STATUS_INTERVAL_MS', errors),
    }),
  };

  const level = env.CUEBUS_LOG_LEVEL;
  if (level !== undefined && level.trim() !== '') {
    const parsed = parseLogLevel(level);
    if (parsed) {
      overrides.logLevel = parsed;
    } else {
      errors.push(`CUEBUS_LOG_LEVEL must be one of ${Object.values(LogLevel).join(', ')}, got "${level}"`);
    }
  }
  return overrides;
}

/** Merge overrides over a base configuration. Returns a new object. */
export function mergeConfig(base: Readonly<CoreConfig>, overrides: ConfigOverrides = {}): CoreConfig {
  return {
    logLevel: overrides.logLevel ?? base.logLevel,
    bus: { ...base.bus, ...overrides.bus },
    transaction: { ...base.transaction, ...overrides.transaction },
    synchronizer: { ...base.synchronizer, ...overrides.synchronizer },
    timeline: { ...base.timeline, ...overrides.timeline },
    health: { ...base.health, ...overrides.health },
    shutdownTimeoutMs: overrides.shutdownTimeoutMs ?? base.shutdownTimeoutMs,
  };
}

/** Check ranges and relationships between settings. */
export function validateConfig(config: CoreConfig): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  const nonNegative: Array<[string, number]> = [
    ['bus.handlerTimeoutMs', config.bus.handlerTimeoutMs],
    ['bus.verifyTimeoutMs', config.bus.verifyTimeoutMs],
    ['transaction.gracePeriodMs', config.transaction.gracePeriodMs],
    ['synchronizer.gracePeriodMs', config.synchronizer.gracePeriodMs],
    ['synchronizer.subscriptionGraceMs', config.synchronizer.subscriptionGraceMs],
    ['synchronizer.defaultTimeoutMs', config.synchronizer.defaultTimeoutMs],
    ['timeline.duckingFadeMs', config.timeline.duckingFadeMs],
    ['timeline.duckSettleMs', config.timeline.duckSettleMs],
    ['timeline.unduckSettleMs', config.timeline.unduckSettleMs],
    ['timeline.speechWaitTimeoutMs', config.timeline.speechWaitTimeoutMs],
    ['health.periodicEmissionMs', config.health.periodicEmissionMs],
    ['shutdownTimeoutMs', config.shutdownTimeoutMs],
  ];
  for (const [name, value] of nonNegative) {
    if (value < 0) errors.push(`${name} must be >= 0, got ${value}`);
  }

  if (config.bus.handlerTimeoutMs === 0) {
    errors.push('bus.handlerTimeoutMs must be greater than 0');
  }
  if (config.synchronizer.maxBufferedEvents < 1) {
    errors.push(`synchronizer.maxBufferedEvents must be >= 1, got ${config.synchronizer.maxBufferedEvents}`);
  }
  if (config.timeline.duckingLevel < 0 || config.timeline.duckingLevel > 1) {
    errors.push(`timeline.duckingLevel must be between 0.0 and 1.0, got ${config.timeline.duckingLevel}`);
  }
  if (config.timeline.speechWaitTimeoutMs > 0 && config.timeline.speechWaitTimeoutMs >= config.bus.handlerTimeoutMs * 12) {
    warnings.push('timeline.speechWaitTimeoutMs is much longer than bus.handlerTimeoutMs; stalled speech will hold the layer for a long time');
  }
  if (config.health.periodicEmissionMs > 0 && config.health.periodicEmissionMs < 1_000) {
    warnings.push('health.periodicEmissionMs below 1000ms will flood SERVICE_STATUS_UPDATE');
  }

  return { valid: errors.length === 0, errors, warnings };
}

/** Build the effective configuration. Throws ValidationError when invalid. */
export function loadConfig(env: Env = process.env, overrides: ConfigOverrides = {}): CoreConfig {
  const errors: string[] = [];
  const fromEnv = readEnvOverrides(env, errors);
  const config = mergeConfig(mergeConfig(DEFAULT_CONFIG, fromEnv), overrides);
  errors.push(...validateConfig(config).errors);

  if (errors.length > 0) {
    throw new ValidationError(
      createTypedError({
        code: 'CONFIG.INVALID',
        message: `Invalid configuration: ${errors.join('; ')}`,
        details: { errors },
      }),
    );
  }
  return config;
}
