export * from './base-service';
export * from './service-manager';
export * from './status-monitor';
export * from './speech-loopback';
