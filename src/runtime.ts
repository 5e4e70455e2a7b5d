/**
 * Core assembly.
 *
 * Wires the bus, the synchronizer and the built-in services from one
 * configuration, and starts and stops them as a unit.
 */

import { EventBus } from './bus/event-bus';
import { EventSynchronizer } from './bus/event-synchronizer';
import { Clock, systemClock } from './clock';
import { CoreConfig, DEFAULT_CONFIG, mergeConfig } from './config';
import { TimelineExecutor } from './engine/timeline-executor';
import { Logger, logger as rootLogger } from './logger';
import { ServiceManager, StopFailure } from './services/service-manager';
import { StatusMonitor } from './services/status-monitor';

/** Everything a running core consists of. */
export interface CoreContext {
  config: CoreConfig;
  clock: Clock;
  bus: EventBus;
  synchronizer: EventSynchronizer;
  executor: TimelineExecutor;
  statusMonitor: StatusMonitor;
  services: ServiceManager;
}

export interface CoreContextOptions {
  config?: CoreConfig;
  clock?: Clock;
  logger?: Logger;
}

/** Create the core with all services registered but not started. */
export function createCoreContext(options: CoreContextOptions = {}): CoreContext {
  const config = options.config ?? mergeConfig(DEFAULT_CONFIG);
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? rootLogger;

  const bus = new EventBus({ config: config.bus, clock, logger });
  const synchronizer = new EventSynchronizer(bus, { config: config.synchronizer, clock, logger });
  const shared = { bus, clock, logger, health: config.health, shutdownTimeoutMs: config.shutdownTimeoutMs };
  const statusMonitor = new StatusMonitor(shared);
  const executor = new TimelineExecutor({ ...shared, config: config.timeline });

  const services = new ServiceManager(bus, { logger });
  services.register(statusMonitor).register(executor);

  return { config, clock, bus, synchronizer, executor, statusMonitor, services };
}

export async function startCore(context: CoreContext): Promise<void> {
  await context.services.startAll();
}

/** Stop every service and drop synchronizer state. Returns the services that failed to stop. */
export async function shutdownCore(context: CoreContext): Promise<StopFailure[]> {
  const failures = await context.services.stopAll();
  context.synchronizer.cleanup();
  return failures;
}
