export * from './gate';
export * from './plan-validator';
export * from './state-machine';
export * from './task-supervisor';
export * from './timeline-executor';
