export * from './event-bus';
export * from './schema-registry';
export * from './transaction-context';
export * from './event-synchronizer';
