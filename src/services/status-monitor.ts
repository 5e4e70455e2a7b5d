/**
 * Status monitor.
 *
 * Collects SERVICE_STATUS_UPDATE and SERVICE_READY events into a table of
 * the latest known state of every service on the bus.
 */

import { ServiceReadyPayload, ServiceStatusPayload } from '../domain/payloads';
import { ServiceStatus } from '../domain/service';
import { EventTopics } from '../domain/topics';
import { BaseService, ServiceOptions } from './base-service';

export interface ServiceStatusEntry extends ServiceStatusPayload {
  ready: boolean;
  /** Clock time (ms) of the last update. */
  receivedAt: number;
}

export class StatusMonitor extends BaseService {
  private entries = new Map<string, ServiceStatusEntry>();

  constructor(options: Omit<ServiceOptions, 'name'> & { name?: string }) {
    super({ ...options, name: options.name ?? 'status_monitor' });
  }

  protected async onStart(): Promise<void> {
    this.subscribe(EventTopics.SERVICE_STATUS_UPDATE, this.handleStatus);
    this.subscribe(EventTopics.SERVICE_READY, this.handleReady);
  }

  protected async onStop(): Promise<void> {
    this.entries.clear();
  }

  getStatus(serviceName: string): ServiceStatusEntry | undefined {
    const entry = this.entries.get(serviceName);
    return entry ? { ...entry } : undefined;
  }

  snapshot(): ServiceStatusEntry[] {
    return [...this.entries.values()].map((entry) => ({ ...entry }));
  }

  /** Services whose latest status is ERROR. */
  failing(): string[] {
    return this.snapshot()
      .filter((entry) => entry.status === ServiceStatus.Error)
      .map((entry) => entry.service_name);
  }

  /** Ask every service (or one) to re-announce its status. */
  async requestStatus(serviceName?: string): Promise<void> {
    await this.bus.publish(EventTopics.SERVICE_STATUS_REQUEST, serviceName === undefined ? {} : { service_name: serviceName });
  }

  private handleStatus = (payload: ServiceStatusPayload): void => {
    const previous = this.entries.get(payload.service_name);
    this.entries.set(payload.service_name, {
      ...payload,
      ready: payload.status === ServiceStatus.Running && (previous?.ready ?? false),
      receivedAt: this.clock.now(),
    });
    if (payload.status === ServiceStatus.Error) {
      this.log.warn('Service reported an error', { reporter: payload.service_name, message: payload.message });
    }
  };

  private handleReady = (payload: ServiceReadyPayload): void => {
    const entry = this.entries.get(payload.service_name);
    if (entry) {
      entry.ready = true;
      entry.receivedAt = this.clock.now();
    } else {
      this.entries.set(payload.service_name, {
        service_name: payload.service_name,
        status: ServiceStatus.Running,
        message: 'ready',
        ready: true,
        receivedAt: this.clock.now(),
      });
    }
  };
}
