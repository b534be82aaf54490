export * from './process-table.js';
export * from './liveness-registry.js';
