/**
 * cuebus: event-driven orchestration core for a show-control character.
 *
 * An in-process event bus with a service lifecycle, transactional emission,
 * event synchronization and a three-layer timeline scheduler. Speech, music,
 * eye and motion controllers are bus peers outside this package.
 */

export * from './domain';
export * from './bus';
export * from './engine';
export * from './services';
export * from './clock';
export * from './config';
export * from './runtime';
export {
  LogLevel,
  LogEntry,
  LogHandler,
  Logger,
  createLogger,
  describeError,
  getLogLevel,
  logger,
  parseLogLevel,
  resetLogHandler,
  setLogHandler,
  setLogLevel,
} from './logger';
