/** Default Unix socket path for the relay server */
export const DEFAULT_SOCKET_PATH = '/tmp/hookd-relay.sock';

/** Lock (PID) file sits next to the socket */
export function lockPathForSocket(socketPath: string): string {
  return `${socketPath}.pid`;
}

export const DEFAULT_RELAY_CONFIG = {
  socketPath: DEFAULT_SOCKET_PATH,
  lockPath: lockPathForSocket(DEFAULT_SOCKET_PATH),
  requestTimeoutMs: 15_000,
  spawnTimeoutMs: 30_000,
  bodyLimit: '1mb',
} as const;

export const DEFAULT_CLI_CONFIG = {
  command: 'claude-flow',
  prefixArgs: [] as string[],
  workerArgs: ['--stdio'] as string[],
  workerEnabled: true,
};

/** Tag passed on the relay command line so duplicate relays can be found with pgrep */
export const RELAY_PROCESS_TAG = 'hookd-relay';

/**
 * Matches the tag only as a whole `--tag` argument, never the socket or
 * lock path, which share the `hookd-relay` stem. Valid both as a pgrep
 * extended regex and as a JS RegExp.
 */
export const RELAY_PROCESS_PATTERN = `--tag ${RELAY_PROCESS_TAG}( |$)`;

export const DEFAULT_REGISTRY_CONFIG = {
  scanDepth: 4,
  stateDirName: '.claude-flow',
  pidFileName: 'daemon.pid',
  stateFileName: 'daemon-state.json',
  daemonPattern: 'claude-flow.* daemon( |$)',
  auxiliaryPattern: RELAY_PROCESS_PATTERN,
  maxAuxiliary: 1,
  terminateGraceMs: 1000,
} as const;

export const DEFAULT_SCHEDULER_CONFIG = {
  defaultBlockMinutes: 60,
} as const;

export const DEFAULT_WATCHDOG_CONFIG = {
  readyTimeoutMs: 5000,
  stopTimeoutMs: 3000,
  pollIntervalMs: 100,
} as const;
