export * from './relay-config.js';
export * from './project-paths.js';
export * from './schemas.js';
export * from './load-config.js';
