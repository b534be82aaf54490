/**
 * Config loader: built-in defaults <- .hookd/config.json <- HOOKD_* env vars.
 */

import fs from 'node:fs';
import { ConfigError } from '@hookd/utils';
import {
  DEFAULT_CLI_CONFIG,
  DEFAULT_RELAY_CONFIG,
  DEFAULT_REGISTRY_CONFIG,
  DEFAULT_SCHEDULER_CONFIG,
  DEFAULT_WATCHDOG_CONFIG,
  lockPathForSocket,
} from './relay-config.js';
import { findProjectRoot, getProjectPaths } from './project-paths.js';
import { HookdConfigFileSchema, HookdConfigSchema, type HookdConfig, type HookdConfigFile } from './schemas.js';

export interface LoadConfigOptions {
  /** Defaults to findProjectRoot(cwd) */
  projectRoot?: string;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Defaults to <projectRoot>/.hookd/config.json */
  configPath?: string;
}

export type EnvOverrides = {
  [K in keyof HookdConfigFile]-?: NonNullable<HookdConfigFile[K]>;
};

function splitArgs(value: string): string[] {
  return value.split(/\s+/).filter((part) => part.length > 0);
}

function parseIntEnv(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ConfigError(`${key} must be an integer (got "${raw}")`);
  }
  return value;
}

export function readEnvOverrides(env: NodeJS.ProcessEnv): EnvOverrides {
  const socketPath = env.HOOKD_SOCKET || undefined;
  const lockPath = env.HOOKD_LOCK_FILE || (socketPath ? lockPathForSocket(socketPath) : undefined);
  const requestTimeoutMs = parseIntEnv(env, 'HOOKD_REQUEST_TIMEOUT_MS');
  const spawnTimeoutMs = parseIntEnv(env, 'HOOKD_SPAWN_TIMEOUT_MS');
  const scanDepth = parseIntEnv(env, 'HOOKD_SCAN_DEPTH');

  return {
    relay: {
      ...(socketPath !== undefined && { socketPath }),
      ...(lockPath !== undefined && { lockPath }),
      ...(requestTimeoutMs !== undefined && { requestTimeoutMs }),
      ...(spawnTimeoutMs !== undefined && { spawnTimeoutMs }),
    },
    cli: {
      ...(env.HOOKD_CLI && { command: env.HOOKD_CLI }),
      ...(env.HOOKD_CLI_ARGS !== undefined && { prefixArgs: splitArgs(env.HOOKD_CLI_ARGS) }),
      ...(env.HOOKD_WORKER_ARGS !== undefined && { workerArgs: splitArgs(env.HOOKD_WORKER_ARGS) }),
      ...(env.HOOKD_WORKER !== undefined && { workerEnabled: env.HOOKD_WORKER !== '0' }),
    },
    registry: {
      ...(scanDepth !== undefined && { scanDepth }),
    },
    scheduler: {
      ...(env.HOOKD_MODEL_STATE && { statePath: env.HOOKD_MODEL_STATE }),
    },
    watchdog: {},
  };
}

export function readConfigFile(configPath: string): HookdConfigFile {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`${configPath} is not valid JSON (${err instanceof Error ? err.message : String(err)})`);
  }

  const parsed = HookdConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`${configPath}: ${parsed.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

export function loadConfig(options: LoadConfigOptions = {}): HookdConfig {
  const env = options.env ?? process.env;
  const projectRoot = options.projectRoot ?? findProjectRoot();
  const paths = getProjectPaths(projectRoot);
  const file = readConfigFile(options.configPath ?? paths.configPath);
  const fromEnv = readEnvOverrides(env);

  // A socket override without an explicit lock path keeps the lock beside it
  const fileRelay = { ...file.relay };
  if (fileRelay.socketPath && !fileRelay.lockPath) {
    fileRelay.lockPath = lockPathForSocket(fileRelay.socketPath);
  }

  const merged = {
    projectRoot,
    relay: { ...DEFAULT_RELAY_CONFIG, ...fileRelay, ...fromEnv.relay },
    cli: { ...DEFAULT_CLI_CONFIG, ...file.cli, ...fromEnv.cli },
    registry: {
      ...DEFAULT_REGISTRY_CONFIG,
      repairLogPath: paths.repairLogPath,
      ...file.registry,
      ...fromEnv.registry,
    },
    scheduler: {
      ...DEFAULT_SCHEDULER_CONFIG,
      statePath: paths.schedulerStatePath,
      ...file.scheduler,
      ...fromEnv.scheduler,
    },
    watchdog: { ...DEFAULT_WATCHDOG_CONFIG, ...file.watchdog, ...fromEnv.watchdog },
  };

  const result = HookdConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join('.')} ${i.message}`).join('; '));
  }
  return result.data;
}
