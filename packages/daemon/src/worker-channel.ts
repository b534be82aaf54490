/**
 * Persistent worker channel
 *
 * One long-lived subprocess speaking line-delimited JSON. Each request
 * carries an `_id`; the worker echoes it on its response line. Every
 * pending entry settles exactly once: by its response, its timeout, or
 * the worker going away.
 */

import { spawn } from 'node:child_process';
import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { WorkerResponseSchema, type ExecuteResult } from '@hookd/config';
import {
  createLogger,
  errorMessage,
  IdGenerator,
  TimeoutError,
  WorkerExitedError,
  WorkerUnavailableError,
} from '@hookd/utils';

const log = createLogger('worker');

/** The slice of ChildProcess the channel relies on */
export interface WorkerProcess {
  readonly pid?: number;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  on(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
  on(event: 'spawn', listener: () => void): this;
}

export type WorkerSpawner = (command: string, args: string[]) => WorkerProcess;

export const spawnWorker: WorkerSpawner = (command, args) =>
  spawn(command, args, { stdio: ['pipe', 'pipe', 'pipe'], env: process.env });

/** Anything that can serve a request; the executor only needs this much */
export interface RequestChannel {
  readonly available: boolean;
  request(args: string[]): Promise<ExecuteResult>;
}

export interface WorkerChannelOptions {
  command: string;
  args: string[];
  requestTimeoutMs: number;
  spawn?: WorkerSpawner;
  idGenerator?: IdGenerator;
}

interface PendingRequest {
  id: string;
  resolve: (result: ExecuteResult) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
  startedAt: number;
}

export type WorkerChannelState = 'idle' | 'starting' | 'ready' | 'closed';

export class WorkerChannel implements RequestChannel {
  private readonly options: WorkerChannelOptions;
  private readonly ids: IdGenerator;
  private readonly pending = new Map<string, PendingRequest>();
  private child?: WorkerProcess;
  private lines?: readline.Interface;
  private _state: WorkerChannelState = 'idle';

  constructor(options: WorkerChannelOptions) {
    this.options = options;
    this.ids = options.idGenerator ?? new IdGenerator('w');
  }

  get state(): WorkerChannelState {
    return this._state;
  }

  get available(): boolean {
    return this._state === 'ready';
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Spawn the worker. Resolves true once it is running, false when it
   * could not be started. Does not respawn a worker that already exited.
   */
  start(): Promise<boolean> {
    if (this._state !== 'idle') {
      return Promise.resolve(this.available);
    }
    this._state = 'starting';

    return new Promise<boolean>((resolve) => {
      let child: WorkerProcess;
      try {
        child = (this.options.spawn ?? spawnWorker)(this.options.command, this.options.args);
      } catch (err) {
        this.close(new WorkerUnavailableError(errorMessage(err)));
        resolve(false);
        return;
      }
      this.child = child;

      child.on('spawn', () => {
        if (this._state !== 'starting') return;
        this._state = 'ready';
        log.info('Persistent worker started', { pid: child.pid, command: this.options.command });
        resolve(true);
      });

      child.on('error', (err) => {
        log.warn('Persistent worker error', { error: err.message });
        this.close(new WorkerUnavailableError(err.message));
        resolve(false);
      });

      child.on('exit', (code, signal) => {
        log.warn('Persistent worker exited', { code, signal, pending: this.pending.size });
        this.close(new WorkerExitedError(code, signal));
        resolve(false);
      });

      child.stdin?.on('error', (err: Error) => {
        log.warn('Worker stdin error', { error: err.message });
      });

      if (child.stdout) {
        this.lines = readline.createInterface({ input: child.stdout });
        this.lines.on('line', (line) => this.handleLine(line));
      }

      child.stderr?.on('data', (chunk: Buffer) => {
        log.debug('Worker stderr', { text: chunk.toString('utf-8').trimEnd() });
      });
    });
  }

  request(args: string[]): Promise<ExecuteResult> {
    const stdin = this.child?.stdin;
    if (!this.available || !stdin) {
      return Promise.reject(new WorkerUnavailableError(this._state === 'closed' ? 'exited' : 'not started'));
    }

    const id = this.ids.next();
    return new Promise<ExecuteResult>((resolve, reject) => {
      const timer = setTimeout(() => {
        if (this.pending.delete(id)) {
          reject(new TimeoutError(`worker request ${id}`, this.options.requestTimeoutMs));
        }
      }, this.options.requestTimeoutMs);

      this.pending.set(id, { id, resolve, reject, timer, startedAt: Date.now() });

      stdin.write(`${JSON.stringify({ _id: id, args })}\n`, (err) => {
        if (err) {
          this.settle(id, new WorkerUnavailableError(`write failed: ${err.message}`));
        }
      });
    });
  }

  /** Terminate the worker and fail whatever is still pending */
  stop(): void {
    if (this._state === 'closed') return;
    const child = this.child;
    this.close(new WorkerUnavailableError('stopped'));
    child?.kill('SIGTERM');
  }

  private handleLine(line: string): void {
    const trimmed = line.trim();
    if (!trimmed) return;

    let raw: unknown;
    try {
      raw = JSON.parse(trimmed);
    } catch {
      log.warn('Dropping malformed worker line', { line: trimmed.slice(0, 200) });
      return;
    }

    const parsed = WorkerResponseSchema.safeParse(raw);
    if (!parsed.success) {
      log.warn('Dropping worker line without a valid _id', { line: trimmed.slice(0, 200) });
      return;
    }

    const response = parsed.data;
    if (!this.pending.has(response._id)) {
      log.debug('Dropping unmatched worker response', { id: response._id });
      return;
    }

    this.settle(response._id, {
      ok: response.ok !== false,
      stdout: response.stdout ?? '',
      stderr: response.stderr ?? '',
    });
  }

  private settle(id: string, outcome: ExecuteResult | Error): void {
    const entry = this.pending.get(id);
    if (!entry) return;
    this.pending.delete(id);
    clearTimeout(entry.timer);
    if (outcome instanceof Error) {
      entry.reject(outcome);
    } else {
      log.debug('Worker response', { id, latencyMs: Date.now() - entry.startedAt });
      entry.resolve(outcome);
    }
  }

  private close(reason: Error): void {
    if (this._state === 'closed') return;
    this._state = 'closed';
    this.lines?.close();
    for (const id of Array.from(this.pending.keys())) {
      this.settle(id, reason);
    }
  }
}
