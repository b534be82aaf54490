/**
 * Watchdog Controller
 *
 * Orchestrates reconciliation and the relay's lifecycle from the outside:
 * check, start-if-absent, stop with escalation, restart, and a composite
 * status view.
 */

import { spawn } from 'node:child_process';
import fs from 'node:fs';
import { getProjectPaths, RELAY_PROCESS_TAG, type HookdConfig, type MetricsResponse } from '@hookd/config';
import {
  ProcessHealthRegistry,
  readPidFile,
  SystemProcessTable,
  type ProcessTable,
  type ReconcileReport,
  type RecordStatus,
} from '@hookd/resiliency';
import { JsonlLog, type JsonlLogStats } from '@hookd/storage';
import { errorMessage, sleep, waitFor, watchdogLog as log } from '@hookd/utils';
import { RelayClient } from './client.js';
import { removeSocketFile } from './socket-file.js';

/** Starts a detached relay process; returns its PID when known */
export type RelayLauncher = () => number | null;

export interface DetachedRelayOptions {
  /** Script that implements `relay` (default: the running CLI entry) */
  entry?: string;
  /** Project root the relay should load config from */
  cwd?: string;
  logFile?: string;
  env?: NodeJS.ProcessEnv;
}

export function detachedRelayLauncher(options: DetachedRelayOptions = {}): RelayLauncher {
  return () => {
    const entry = options.entry ?? process.argv[1];
    const env = { ...(options.env ?? process.env) };
    if (options.logFile) {
      env.HOOKD_LOG_FILE = options.logFile;
    }
    const child = spawn(process.execPath, [...process.execArgv, entry, 'relay', '--tag', RELAY_PROCESS_TAG], {
      cwd: options.cwd,
      env,
      detached: true,
      stdio: 'ignore',
    });
    child.unref();
    return child.pid ?? null;
  };
}

export type StartStatus = 'already-running' | 'started' | 'failed';
export type StopStatus = 'not-running' | 'stopped' | 'killed';

export interface StartResult {
  status: StartStatus;
  pid: number | null;
  reconcile: ReconcileReport;
}

export interface StopResult {
  status: StopStatus;
  pid: number | null;
}

export interface RelayStatus {
  running: boolean;
  pid: number | null;
  pidAlive: boolean;
  healthy: boolean;
  metrics: MetricsResponse | null;
}

export interface WatchdogStatus {
  relay: RelayStatus;
  records: RecordStatus[];
  repairLog: JsonlLogStats & { path: string | null };
}

export interface WatchdogControllerOptions {
  config: HookdConfig;
  processTable?: ProcessTable;
  registry?: ProcessHealthRegistry;
  client?: RelayClient;
  launch?: RelayLauncher;
}

export class WatchdogController {
  private config: HookdConfig;
  private table: ProcessTable;
  private registry: ProcessHealthRegistry;
  private client: RelayClient;
  private launch: RelayLauncher;

  constructor(options: WatchdogControllerOptions) {
    this.config = options.config;
    this.table = options.processTable ?? new SystemProcessTable();
    this.registry =
      options.registry ??
      new ProcessHealthRegistry({
        root: options.config.projectRoot,
        config: options.config.registry,
        relayLockPath: options.config.relay.lockPath,
        processTable: this.table,
      });
    this.client = options.client ?? new RelayClient({ socketPath: options.config.relay.socketPath, timeoutMs: 2000 });
    this.launch =
      options.launch ??
      detachedRelayLauncher({
        cwd: options.config.projectRoot,
        logFile: getProjectPaths(options.config.projectRoot).relayLogPath,
      });
  }

  /** Reconciliation pass only */
  async check(): Promise<ReconcileReport> {
    return this.registry.reconcile();
  }

  async start(): Promise<StartResult> {
    const reconcile = await this.registry.reconcile();

    const health = await this.client.health();
    if (health) {
      log.info('Relay already running', { pid: health.pid });
      return { status: 'already-running', pid: health.pid, reconcile };
    }

    const lockPid = await readPidFile(this.config.relay.lockPath);
    if (lockPid !== null && this.table.isAlive(lockPid)) {
      log.info('Relay lock held by a live process', { pid: lockPid });
      return { status: 'already-running', pid: lockPid, reconcile };
    }

    let launchedPid: number | null;
    try {
      launchedPid = this.launch();
    } catch (err) {
      log.error('Failed to launch relay', { error: errorMessage(err) });
      return { status: 'failed', pid: null, reconcile };
    }

    const { readyTimeoutMs, pollIntervalMs } = this.config.watchdog;
    let readyPid: number | null = null;
    const ready = await waitFor(
      async () => {
        const probe = await this.client.health();
        readyPid = probe?.pid ?? null;
        return probe !== null;
      },
      { timeoutMs: readyTimeoutMs, intervalMs: pollIntervalMs },
    );

    if (!ready) {
      log.error('Relay did not become ready', { timeoutMs: readyTimeoutMs, pid: launchedPid });
      return { status: 'failed', pid: launchedPid, reconcile };
    }
    log.info('Relay started', { pid: readyPid ?? launchedPid });
    return { status: 'started', pid: readyPid ?? launchedPid, reconcile };
  }

  async stop(): Promise<StopResult> {
    const pid = await readPidFile(this.config.relay.lockPath);
    if (pid === null || !this.table.isAlive(pid)) {
      await this.cleanupArtifacts(pid);
      return { status: 'not-running', pid };
    }

    const { stopTimeoutMs, pollIntervalMs } = this.config.watchdog;
    this.table.terminate(pid, false);
    const exited = await waitFor(() => !this.table.isAlive(pid), {
      timeoutMs: stopTimeoutMs,
      intervalMs: pollIntervalMs,
    });

    if (exited) {
      await this.cleanupArtifacts(pid);
      log.info('Relay stopped', { pid });
      return { status: 'stopped', pid };
    }

    log.warn('Relay ignored SIGTERM, sending SIGKILL', { pid });
    this.table.terminate(pid, true);
    await waitFor(() => !this.table.isAlive(pid), { timeoutMs: stopTimeoutMs, intervalMs: pollIntervalMs });
    await this.cleanupArtifacts(pid);
    return { status: 'killed', pid };
  }

  async restart(): Promise<{ stop: StopResult; start: StartResult }> {
    const stopResult = await this.stop();
    // Let the old socket close before probing for the new one
    await sleep(this.config.watchdog.pollIntervalMs);
    const startResult = await this.start();
    return { stop: stopResult, start: startResult };
  }

  async status(): Promise<WatchdogStatus> {
    const health = await this.client.health();
    const metrics = health ? await this.client.metrics() : null;
    const lockPid = await readPidFile(this.config.relay.lockPath);
    const pidAlive = lockPid !== null && this.table.isAlive(lockPid);

    const repairLogPath = this.registry.repairLogPath ?? null;
    let repairStats: JsonlLogStats = { entries: 0, bytes: 0 };
    if (repairLogPath) {
      try {
        repairStats = await new JsonlLog(repairLogPath).stats();
      } catch (err) {
        log.warn('Failed to read repair log', { path: repairLogPath, error: errorMessage(err) });
      }
    }

    return {
      relay: {
        running: health !== null || pidAlive,
        pid: health?.pid ?? lockPid,
        pidAlive,
        healthy: health !== null,
        metrics,
      },
      records: await this.registry.listRecords(),
      repairLog: { ...repairStats, path: repairLogPath },
    };
  }

  /** Remove a dead relay's socket, and its lock unless someone else took it */
  private async cleanupArtifacts(deadPid: number | null): Promise<void> {
    const { lockPath, socketPath } = this.config.relay;
    const current = await readPidFile(lockPath);
    if (current !== null && current !== deadPid && this.table.isAlive(current)) {
      return;
    }
    try {
      removeSocketFile(socketPath);
    } catch (err) {
      log.warn('Left socket path in place', { socketPath, error: errorMessage(err) });
    }
    try {
      await fs.promises.rm(lockPath, { force: true });
    } catch (err) {
      log.warn('Failed to remove lock', { lockPath, error: errorMessage(err) });
    }
  }
}
