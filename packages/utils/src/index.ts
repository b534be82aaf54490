/**
 * @hookd/utils
 *
 * Shared utilities: logging, typed errors, command resolution,
 * bounded readiness polling and correlation IDs.
 */

export * from './logger.js';
export * from './errors.js';
export * from './command-resolver.js';
export * from './wait-for.js';
export * from './id-generator.js';
