/**
 * @hookd/daemon
 *
 * The relay process and the tooling that manages it from outside:
 * - RelayServer: singleton HTTP service on a Unix socket
 * - WorkerChannel: one persistent tool process speaking JSON lines
 * - Executor: persistent-first dispatch with a one-shot fallback
 * - RelayClient: socket client used by the CLI and the watchdog
 * - WatchdogController: reconcile, start, stop and status
 */

// Relay process
export * from './server.js';
export * from './lock.js';
export * from './socket-file.js';
export * from './worker-channel.js';
export * from './one-shot.js';
export * from './executor.js';
export * from './metrics.js';

// Outside the relay
export * from './client.js';
export * from './watchdog-controller.js';
