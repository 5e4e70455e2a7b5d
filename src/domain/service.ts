/**
 * Service lifecycle domain model.
 */

export enum ServiceStatus {
  Initializing = 'INITIALIZING',
  Starting = 'STARTING',
  Running = 'RUNNING',
  Stopping = 'STOPPING',
  Stopped = 'STOPPED',
  Error = 'ERROR',
}

/** Severity attached to status updates. */
export enum Severity {
  Debug = 'DEBUG',
  Info = 'INFO',
  Warning = 'WARNING',
  Error = 'ERROR',
  Critical = 'CRITICAL',
}

/** Valid lifecycle transitions. ERROR is reachable from every in-flight state. */
export const VALID_SERVICE_TRANSITIONS: Record<ServiceStatus, ServiceStatus[]> = {
  [ServiceStatus.Initializing]: [ServiceStatus.Starting],
  [ServiceStatus.Starting]: [ServiceStatus.Running, ServiceStatus.Error],
  [ServiceStatus.Running]: [ServiceStatus.Stopping, ServiceStatus.Error],
  [ServiceStatus.Stopping]: [ServiceStatus.Stopped, ServiceStatus.Error],
  [ServiceStatus.Stopped]: [ServiceStatus.Starting],
  [ServiceStatus.Error]: [ServiceStatus.Starting, ServiceStatus.Stopping],
};

/** Health reporting options for a service. */
export interface HealthConfig {
  /** Re-emit the current status on this interval while running. 0 disables. */
  periodicEmissionMs: number;
  /** Severity used for periodic and on-request status emissions. */
  routineSeverity: Severity;
}

export const DEFAULT_HEALTH_CONFIG: Readonly<HealthConfig> = {
  periodicEmissionMs: 0,
  routineSeverity: Severity.Debug,
};
