export * from './availability-scheduler.js';
export * from './defaults.js';
export * from './rate-limit.js';
