/**
 * Process Health Registry
 *
 * Reconciles liveness records (a PID marker plus a status document left
 * behind by a supervised daemon) against the live process table:
 * - deletes PID markers whose process is gone
 * - repairs status documents that still claim running=true
 * - reclaims daemon processes nobody recorded, and trims duplicate relays
 *
 * The status documents are owned by another writer, so every repair
 * re-reads the document and skips on conflict. Nothing here throws.
 */

import fs from 'node:fs';
import path from 'node:path';
import { isDeepStrictEqual } from 'node:util';
import {
  DEFAULT_REGISTRY_CONFIG,
  LivenessStatusSchema,
  type LivenessStatus,
  type RegistryConfig,
} from '@hookd/config';
import { JsonFileStore, JsonlLog } from '@hookd/storage';
import { errorMessage, registryLog as log, sleep } from '@hookd/utils';
import { parsePid, SystemProcessTable, type ProcessTable } from './process-table.js';

export interface LivenessRecord {
  /** The state directory itself */
  dir: string;
  pidPath: string;
  statePath: string;
}

export interface DiscoveryOptions {
  stateDirName?: string;
  pidFileName?: string;
  stateFileName?: string;
}

const SKIP_DIRS = new Set(['node_modules', '.git']);

/**
 * Liveness records under `root`, at most `maxDepth` directory levels below
 * it. Iterating again rescans the tree.
 */
export function discoverLivenessRecords(
  root: string,
  maxDepth: number,
  options: DiscoveryOptions = {},
): Iterable<LivenessRecord> {
  const stateDirName = options.stateDirName ?? DEFAULT_REGISTRY_CONFIG.stateDirName;
  const pidFileName = options.pidFileName ?? DEFAULT_REGISTRY_CONFIG.pidFileName;
  const stateFileName = options.stateFileName ?? DEFAULT_REGISTRY_CONFIG.stateFileName;

  function* walk(dir: string, depth: number): Generator<LivenessRecord> {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch {
      return;
    }

    if (path.basename(dir) === stateDirName) {
      const names = new Set(entries.filter((e) => e.isFile()).map((e) => e.name));
      if (names.has(pidFileName) || names.has(stateFileName)) {
        yield {
          dir,
          pidPath: path.join(dir, pidFileName),
          statePath: path.join(dir, stateFileName),
        };
      }
      return;
    }

    if (depth >= maxDepth) return;
    for (const entry of entries) {
      if (entry.isDirectory() && !SKIP_DIRS.has(entry.name)) {
        yield* walk(path.join(dir, entry.name), depth + 1);
      }
    }
  }

  return {
    [Symbol.iterator]: () => walk(path.resolve(root), 0),
  };
}

export type RepairEvent =
  | { type: 'stale-pid'; path: string; pid: number | null }
  | { type: 'zombie-state'; path: string; pid: number | null }
  | { type: 'orphan-terminated'; pid: number; forceful: boolean }
  | { type: 'duplicate-terminated'; pid: number; forceful: boolean };

export type RepairLogEntry = RepairEvent & { ts: string };

export interface ReconcileReport {
  stalePidFiles: number;
  zombieStates: number;
  orphansTerminated: number;
  duplicatesTerminated: number;
  /** Sum of the four counters above */
  repairs: number;
  errors: number;
}

export interface ReclaimReport {
  orphansTerminated: number;
  duplicatesTerminated: number;
  errors: number;
}

export interface RecordStatus {
  dir: string;
  pid: number | null;
  pidAlive: boolean;
  running: boolean | null;
  startedAt: string | number | null;
}

export interface ProcessHealthRegistryOptions {
  root: string;
  config?: Partial<RegistryConfig>;
  /** Relay lock file; its PID is never treated as an orphan */
  relayLockPath?: string;
  processTable?: ProcessTable;
  /** Wait between SIGTERM and SIGKILL */
  sleep?: (ms: number) => Promise<void>;
  /** PID of the calling process, never terminated */
  selfPid?: number;
}

type ResolvedRegistryConfig = Omit<RegistryConfig, 'repairLogPath'> & { repairLogPath?: string };

export class ProcessHealthRegistry {
  readonly root: string;
  private config: ResolvedRegistryConfig;
  private relayLockPath?: string;
  private table: ProcessTable;
  private sleep: (ms: number) => Promise<void>;
  private selfPid: number;
  private repairLog?: JsonlLog<RepairLogEntry>;

  constructor(options: ProcessHealthRegistryOptions) {
    this.root = options.root;
    this.config = { ...DEFAULT_REGISTRY_CONFIG, ...options.config };
    this.relayLockPath = options.relayLockPath;
    this.table = options.processTable ?? new SystemProcessTable();
    this.sleep = options.sleep ?? sleep;
    this.selfPid = options.selfPid ?? process.pid;
    if (this.config.repairLogPath) {
      this.repairLog = new JsonlLog(this.config.repairLogPath);
    }
  }

  get repairLogPath(): string | undefined {
    return this.config.repairLogPath;
  }

  discover(): Iterable<LivenessRecord> {
    return discoverLivenessRecords(this.root, this.config.scanDepth, this.config);
  }

  /** False for empty, non-numeric and non-positive PIDs */
  isAlive(pid: string | number | null | undefined): boolean {
    const parsed = parsePid(pid);
    return parsed !== null && this.table.isAlive(parsed);
  }

  async reconcile(): Promise<ReconcileReport> {
    const report: ReconcileReport = {
      stalePidFiles: 0,
      zombieStates: 0,
      orphansTerminated: 0,
      duplicatesTerminated: 0,
      repairs: 0,
      errors: 0,
    };

    for (const record of this.discover()) {
      try {
        await this.reconcileRecord(record, report);
      } catch (err) {
        report.errors++;
        log.warn('Failed to reconcile liveness record', { dir: record.dir, error: errorMessage(err) });
      }
    }

    const knownPids = await this.collectKnownPids();
    const reclaimed = await this.reclaimOrphans(knownPids);
    report.orphansTerminated = reclaimed.orphansTerminated;
    report.duplicatesTerminated = reclaimed.duplicatesTerminated;
    report.errors += reclaimed.errors;

    report.repairs = report.stalePidFiles + report.zombieStates + report.orphansTerminated + report.duplicatesTerminated;
    if (report.repairs > 0 || report.errors > 0) {
      log.info('Reconcile complete', { ...report });
    } else {
      log.debug('Reconcile complete, nothing to repair');
    }
    return report;
  }

  /**
   * Terminate processes matching the daemon pattern that no liveness record
   * or relay lock accounts for, then trim duplicate relay processes so at
   * most `maxAuxiliary` remain. Survivors of SIGTERM get SIGKILL after the
   * grace period.
   */
  async reclaimOrphans(knownPids: ReadonlySet<number>): Promise<ReclaimReport> {
    const report: ReclaimReport = { orphansTerminated: 0, duplicatesTerminated: 0, errors: 0 };
    const victims = new Map<number, 'orphan-terminated' | 'duplicate-terminated'>();

    const daemonPids = await this.findProcesses(this.config.daemonPattern, report);
    for (const pid of daemonPids) {
      if (!knownPids.has(pid) && pid !== this.selfPid) {
        victims.set(pid, 'orphan-terminated');
      }
    }

    const auxPids = await this.findProcesses(this.config.auxiliaryPattern, report);
    const kept = auxPids.filter((pid) => knownPids.has(pid) || pid === this.selfPid);
    // Higher PID stands in for later start
    const others = auxPids.filter((pid) => !knownPids.has(pid) && pid !== this.selfPid).sort((a, b) => b - a);
    const slots = Math.max(0, this.config.maxAuxiliary - kept.length);
    for (const pid of others.slice(slots)) {
      if (!victims.has(pid)) {
        victims.set(pid, 'duplicate-terminated');
      }
    }

    if (victims.size === 0) {
      return report;
    }

    const signalled: Array<[number, 'orphan-terminated' | 'duplicate-terminated']> = [];
    for (const [pid, type] of victims) {
      try {
        if (this.table.terminate(pid, false)) {
          signalled.push([pid, type]);
        }
      } catch (err) {
        report.errors++;
        log.warn('Failed to terminate process', { pid, error: errorMessage(err) });
      }
    }

    if (signalled.length > 0) {
      await this.sleep(this.config.terminateGraceMs);
    }

    for (const [pid, type] of signalled) {
      let forceful = false;
      if (this.table.isAlive(pid)) {
        try {
          forceful = this.table.terminate(pid, true);
        } catch (err) {
          report.errors++;
          log.warn('Failed to kill process', { pid, error: errorMessage(err) });
        }
      }
      if (type === 'orphan-terminated') {
        report.orphansTerminated++;
      } else {
        report.duplicatesTerminated++;
      }
      log.info(type === 'orphan-terminated' ? 'Terminated orphaned daemon' : 'Terminated duplicate relay', {
        pid,
        forceful,
      });
      await this.recordRepair({ type, pid, forceful });
    }

    return report;
  }

  /** PIDs of every live liveness record plus the relay lock owner */
  async collectKnownPids(): Promise<Set<number>> {
    const known = new Set<number>();
    for (const record of this.discover()) {
      const pid = await readPidFile(record.pidPath);
      if (pid !== null && this.table.isAlive(pid)) {
        known.add(pid);
      }
    }
    if (this.relayLockPath) {
      const lockPid = await readPidFile(this.relayLockPath);
      if (lockPid !== null) {
        known.add(lockPid);
      }
    }
    return known;
  }

  async listRecords(): Promise<RecordStatus[]> {
    const statuses: RecordStatus[] = [];
    for (const record of this.discover()) {
      const pid = await readPidFile(record.pidPath);
      const state = await new JsonFileStore({ filePath: record.statePath, schema: LivenessStatusSchema }).read();
      statuses.push({
        dir: record.dir,
        pid,
        pidAlive: pid !== null && this.table.isAlive(pid),
        running: state?.running ?? null,
        startedAt: state?.startedAt ?? null,
      });
    }
    return statuses;
  }

  private async reconcileRecord(record: LivenessRecord, report: ReconcileReport): Promise<void> {
    const pidFileExists = fs.existsSync(record.pidPath);
    const pid = pidFileExists ? await readPidFile(record.pidPath) : null;
    const pidAlive = pid !== null && this.table.isAlive(pid);

    if (pidFileExists && !pidAlive) {
      await fs.promises.rm(record.pidPath, { force: true });
      report.stalePidFiles++;
      log.info('Removed stale PID marker', { path: record.pidPath, pid });
      await this.recordRepair({ type: 'stale-pid', path: record.pidPath, pid });
    }

    const store = new JsonFileStore<LivenessStatus>({ filePath: record.statePath, schema: LivenessStatusSchema });
    const first = await store.load();
    if (first.status === 'invalid') {
      report.errors++;
      log.warn('Unreadable status document', { path: record.statePath, error: first.error });
      return;
    }
    if (first.status === 'missing' || first.value.running !== true || pidAlive) {
      return;
    }

    // Re-read right before writing; the daemon may have restarted meanwhile
    const latest = await store.load();
    if (latest.status !== 'ok' || !isDeepStrictEqual(latest.value, first.value)) {
      log.warn('Status document changed during repair, skipping', { path: record.statePath });
      return;
    }

    await store.write({ ...latest.value, running: false, startedAt: null, savedAt: null });
    report.zombieStates++;
    log.info('Repaired zombie status document', { path: record.statePath, pid });
    await this.recordRepair({ type: 'zombie-state', path: record.statePath, pid });
  }

  private async findProcesses(pattern: string, report: ReclaimReport): Promise<number[]> {
    try {
      return await this.table.find(pattern);
    } catch (err) {
      report.errors++;
      log.warn('Process search failed', { pattern, error: errorMessage(err) });
      return [];
    }
  }

  private async recordRepair(event: RepairEvent): Promise<void> {
    if (!this.repairLog) return;
    try {
      await this.repairLog.append({ ...event, ts: new Date().toISOString() });
    } catch (err) {
      log.warn('Failed to append repair log', { error: errorMessage(err) });
    }
  }
}

/** PID recorded in a marker or lock file, or null */
export async function readPidFile(filePath: string): Promise<number | null> {
  try {
    return parsePid(await fs.promises.readFile(filePath, 'utf-8'));
  } catch {
    return null;
  }
}
