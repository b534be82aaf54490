/**
 * Process table capability
 *
 * Liveness probing, termination and command-line search behind one
 * interface so the registry and watchdog can run against a fake table.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export interface ProcessTable {
  /** Existence probe; never delivers a signal */
  isAlive(pid: number): boolean;
  /** SIGTERM, or SIGKILL when forceful. False when the process was already gone. */
  terminate(pid: number, forceful: boolean): boolean;
  /** PIDs whose full command line matches `pattern` (extended regex) */
  find(pattern: string): Promise<number[]>;
}

/**
 * Parse a PID from marker-file content or user input.
 * Empty, non-numeric and non-positive values yield null.
 */
export function parsePid(raw: string | number | null | undefined): number | null {
  if (raw === null || raw === undefined) return null;
  const text = String(raw).trim();
  if (!/^\d+$/.test(text)) return null;
  const pid = Number(text);
  return Number.isSafeInteger(pid) && pid > 0 ? pid : null;
}

function errorCode(err: unknown): unknown {
  return err instanceof Error && 'code' in err ? err.code : undefined;
}

export class SystemProcessTable implements ProcessTable {
  isAlive(pid: number): boolean {
    if (!Number.isInteger(pid) || pid <= 0) return false;
    try {
      // Signal 0 checks existence without killing
      process.kill(pid, 0);
      return true;
    } catch (err) {
      // Exists but owned by another user
      return errorCode(err) === 'EPERM';
    }
  }

  terminate(pid: number, forceful: boolean): boolean {
    try {
      process.kill(pid, forceful ? 'SIGKILL' : 'SIGTERM');
      return true;
    } catch (err) {
      if (errorCode(err) === 'ESRCH') return false;
      throw err;
    }
  }

  async find(pattern: string): Promise<number[]> {
    try {
      const { stdout } = await execFileAsync('pgrep', ['-f', '--', pattern], { encoding: 'utf8' });
      return stdout
        .split('\n')
        .map((line) => parsePid(line))
        .filter((pid): pid is number => pid !== null);
    } catch (err) {
      // pgrep exits 1 when nothing matched
      if (errorCode(err) === 1) return [];
      throw err;
    }
  }
}

interface ProcessEntry {
  command: string;
  /** Survives SIGTERM; only SIGKILL removes it */
  ignoresTerm: boolean;
}

export interface SignalRecord {
  pid: number;
  signal: 'SIGTERM' | 'SIGKILL';
}

/**
 * In-process table for tests and dry runs. Terminated processes vanish
 * immediately unless added with `ignoresTerm`.
 */
export class MemoryProcessTable implements ProcessTable {
  private processes = new Map<number, ProcessEntry>();
  readonly signals: SignalRecord[] = [];

  constructor(entries: Array<{ pid: number; command: string }> = []) {
    for (const entry of entries) {
      this.add(entry.pid, entry.command);
    }
  }

  add(pid: number, command: string, options: { ignoresTerm?: boolean } = {}): this {
    this.processes.set(pid, { command, ignoresTerm: options.ignoresTerm ?? false });
    return this;
  }

  remove(pid: number): void {
    this.processes.delete(pid);
  }

  pids(): number[] {
    return Array.from(this.processes.keys()).sort((a, b) => a - b);
  }

  isAlive(pid: number): boolean {
    return this.processes.has(pid);
  }

  terminate(pid: number, forceful: boolean): boolean {
    const entry = this.processes.get(pid);
    if (!entry) return false;
    this.signals.push({ pid, signal: forceful ? 'SIGKILL' : 'SIGTERM' });
    if (forceful || !entry.ignoresTerm) {
      this.processes.delete(pid);
    }
    return true;
  }

  async find(pattern: string): Promise<number[]> {
    const regex = new RegExp(pattern);
    return this.pids().filter((pid) => {
      const entry = this.processes.get(pid);
      return entry !== undefined && regex.test(entry.command);
    });
  }
}
