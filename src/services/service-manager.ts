/**
 * Service manager.
 *
 * Starts services in registration order, checks that every subscribed
 * topic delivers, and stops services in reverse order.
 */

import { EventBus } from '../bus/event-bus';
import { ValidationError, createTypedError, validationError } from '../domain/errors';
import { Logger, describeError, logger as rootLogger } from '../logger';
import { BaseService } from './base-service';

export interface StopFailure {
  service: string;
  error: string;
}

export class ServiceManager {
  private services: BaseService[] = [];
  private readonly log: Logger;

  constructor(private readonly bus: EventBus, options: { logger?: Logger } = {}) {
    this.log = (options.logger ?? rootLogger).child({ module: 'service-manager' });
  }

  register(service: BaseService): this {
    if (this.services.some((existing) => existing.name === service.name)) {
      throw new ValidationError(validationError(`Service already registered: ${service.name}`, { service: service.name }));
    }
    this.services.push(service);
    return this;
  }

  get(name: string): BaseService | undefined {
    return this.services.find((service) => service.name === name);
  }

  list(): BaseService[] {
    return [...this.services];
  }

  /**
   * Start every service in order. If one fails, the ones already started
   * are stopped again and the error is re-thrown.
   */
  async startAll(): Promise<void> {
    const started: BaseService[] = [];
    for (const service of this.services) {
      try {
        await service.start();
        started.push(service);
      } catch (err) {
        this.log.error('Service failed to start', { service: service.name, error: describeError(err) });
        await this.stopServices([...started, service].reverse());
        throw err;
      }
    }
    this.log.info('All services started', { count: started.length });
  }

  /** Probe every subscribed topic. Throws ValidationError naming the topics that did not deliver. */
  async verifyWiring(timeoutMs?: number): Promise<void> {
    const results = await this.bus.verifyAll(timeoutMs);
    const broken = Object.entries(results)
      .filter(([, ok]) => !ok)
      .map(([topic]) => topic);
    if (broken.length > 0) {
      throw new ValidationError(
        createTypedError({
          code: 'BUS.WIRING',
          message: `Topics failed verification: ${broken.join(', ')}`,
          retryable: true,
          details: { topics: broken },
        }),
      );
    }
  }

  /** Stop every service in reverse order. Failures are collected, not thrown. */
  async stopAll(): Promise<StopFailure[]> {
    return this.stopServices([...this.services].reverse());
  }

  private async stopServices(services: BaseService[]): Promise<StopFailure[]> {
    const failures: StopFailure[] = [];
    for (const service of services) {
      try {
        await service.stop();
      } catch (err) {
        this.log.error('Service failed to stop', { service: service.name, error: describeError(err) });
        failures.push({ service: service.name, error: describeError(err) });
      }
    }
    return failures;
  }
}
