/**
 * Domain model exports.
 */

export * from './errors';
export * from './payloads';
export * from './plan';
export * from './service';
export * from './topics';
export * from './transaction';
