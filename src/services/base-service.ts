/**
 * Service lifecycle base class.
 *
 * A service owns its bus subscriptions and background tasks. `start()` and
 * `stop()` walk the lifecycle state machine and announce every transition
 * on SERVICE_STATUS_UPDATE; `stop()` always releases subscriptions and
 * tasks, even when the subclass hook fails.
 */

import { Clock, systemClock } from '../clock';
import { DEFAULT_CONFIG } from '../config';
import { AnyHandler, EventBus } from '../bus/event-bus';
import { LifecycleError, isCancellation, lifecycleTransitionError } from '../domain/errors';
import { EventHandler, PayloadFor, ServiceStatusRequestPayload } from '../domain/payloads';
import { DEFAULT_HEALTH_CONFIG, HealthConfig, ServiceStatus, Severity } from '../domain/service';
import { EventTopics } from '../domain/topics';
import { isActiveServiceStatus, transitionServiceStatus } from '../engine/state-machine';
import { TaskSupervisor } from '../engine/task-supervisor';
import { Logger, describeError, logger as rootLogger } from '../logger';

export interface ServiceOptions {
  name: string;
  bus: EventBus;
  clock?: Clock;
  logger?: Logger;
  health?: Partial<HealthConfig>;
  /** Bound for joining background tasks during stop. */
  shutdownTimeoutMs?: number;
}

interface OwnedSubscription {
  topic: string;
  handler: AnyHandler;
}

/** Format elapsed milliseconds as H:MM:SS. */
export function formatUptime(elapsedMs: number): string {
  const total = Math.max(0, Math.floor(elapsedMs / 1000));
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const seconds = total % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

export abstract class BaseService {
  readonly name: string;
  readonly health: HealthConfig;
  protected readonly bus: EventBus;
  protected readonly clock: Clock;
  protected readonly log: Logger;
  protected readonly tasks: TaskSupervisor;
  private readonly shutdownTimeoutMs: number;
  private _status = ServiceStatus.Initializing;
  private startedAt: number | undefined;
  private owned: OwnedSubscription[] = [];

  constructor(options: ServiceOptions) {
    this.name = options.name;
    this.bus = options.bus;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? rootLogger).child({ service: options.name });
    this.health = { ...DEFAULT_HEALTH_CONFIG, ...options.health };
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? DEFAULT_CONFIG.shutdownTimeoutMs;
    this.tasks = new TaskSupervisor({ logger: this.log, clock: this.clock });
  }

  get status(): ServiceStatus {
    return this._status;
  }

  get isRunning(): boolean {
    return this._status === ServiceStatus.Running;
  }

  /** Service-specific startup. Subscribe to topics here. */
  protected async onStart(): Promise<void> {}

  /** Service-specific shutdown, run before subscriptions are released. */
  protected async onStop(): Promise<void> {}

  async start(): Promise<void> {
    if (isActiveServiceStatus(this._status)) return;

    await this.transition(ServiceStatus.Starting, `${this.name} starting`);
    this.startedAt = this.clock.now();
    try {
      this.subscribe(EventTopics.SERVICE_STATUS_REQUEST, this.handleStatusRequest);
      await this.onStart();
    } catch (err) {
      await this.transition(ServiceStatus.Error, `${this.name} failed to start: ${describeError(err)}`, Severity.Error);
      throw err;
    }

    await this.transition(ServiceStatus.Running, `${this.name} started`);
    if (this.health.periodicEmissionMs > 0) {
      this.tasks.spawn(`${this.name}:status`, (signal) => this.emitPeriodically(signal));
    }
    await this.bus.publish(EventTopics.SERVICE_READY, {
      service_name: this.name,
      timestamp: new Date(this.clock.now()).toISOString(),
    });
  }

  async stop(): Promise<void> {
    if (this._status !== ServiceStatus.Running && this._status !== ServiceStatus.Error) return;

    await this.transition(ServiceStatus.Stopping, `${this.name} stopping`);
    let failed = false;
    let failure: unknown;
    try {
      await this.onStop();
    } catch (err) {
      failed = true;
      failure = err;
    }

    this.tasks.cancelAll('shutdown');
    await this.tasks.join(this.shutdownTimeoutMs);
    this.removeSubscriptions();

    if (failed) {
      await this.transition(ServiceStatus.Error, `${this.name} failed to stop: ${describeError(failure)}`, Severity.Error);
      throw failure;
    }
    await this.transition(ServiceStatus.Stopped, `${this.name} stopped`);
  }

  /** Subscribe through the bus and remember the handler for cleanup. */
  protected subscribe<T extends string>(topic: T, handler: EventHandler<PayloadFor<T>>): void {
    this.bus.subscribe(topic, handler);
    if (!this.owned.some((entry) => entry.topic === topic && entry.handler === handler)) {
      this.owned.push({ topic, handler });
    }
  }

  protected unsubscribe(topic: string, handler: AnyHandler): void {
    this.bus.unsubscribe(topic, handler);
    this.owned = this.owned.filter((entry) => !(entry.topic === topic && entry.handler === handler));
  }

  /** Topics this service currently holds subscriptions on. */
  subscribedTopics(): string[] {
    return [...new Set(this.owned.map((entry) => entry.topic))];
  }

  /** Publish a status update without changing the lifecycle state. */
  async emitStatus(status: ServiceStatus, message: string, severity: Severity = Severity.Info): Promise<void> {
    const now = this.clock.now();
    await this.bus.publish(EventTopics.SERVICE_STATUS_UPDATE, {
      service_name: this.name,
      status,
      message,
      severity,
      uptime: formatUptime(this.startedAt === undefined ? 0 : now - this.startedAt),
      last_update: new Date(now).toISOString(),
    });
  }

  /** Report an asynchronous failure as an ERROR status update; never throws. */
  protected async reportError(message: string): Promise<void> {
    this.log.error(message);
    try {
      await this.emitStatus(ServiceStatus.Error, message, Severity.Error);
    } catch (err) {
      this.log.error('Failed to publish error status', { error: describeError(err) });
    }
  }

  private async transition(target: ServiceStatus, message: string, severity: Severity = Severity.Info): Promise<void> {
    const result = transitionServiceStatus(this._status, target);
    if (!result.success || !result.newStatus) {
      throw new LifecycleError(result.error ?? lifecycleTransitionError(this.name, this._status, target));
    }
    this._status = result.newStatus;
    if (severity === Severity.Error) {
      this.log.error(message, { status: target });
    } else {
      this.log.info(message, { status: target });
    }
    await this.emitStatus(target, message, severity);
  }

  private removeSubscriptions(): void {
    for (const { topic, handler } of this.owned) {
      try {
        this.bus.unsubscribe(topic, handler);
      } catch (err) {
        this.log.warn('Failed to remove subscription', { topic, error: describeError(err) });
      }
    }
    this.owned = [];
  }

  private handleStatusRequest = async (payload: ServiceStatusRequestPayload): Promise<void> => {
    if (payload.service_name !== undefined && payload.service_name !== this.name) return;
    if (this._status !== ServiceStatus.Running) return;
    await this.emitStatus(ServiceStatus.Running, `${this.name} is online`, this.health.routineSeverity);
  };

  private async emitPeriodically(signal: AbortSignal): Promise<void> {
    for (;;) {
      await this.clock.sleep(this.health.periodicEmissionMs, signal);
      try {
        if (this._status === ServiceStatus.Running) {
          await this.emitStatus(ServiceStatus.Running, `${this.name} is online`, this.health.routineSeverity);
        }
      } catch (err) {
        if (isCancellation(err)) throw err;
        this.log.error('Periodic status emission failed', { error: describeError(err) });
      }
    }
  }
}
