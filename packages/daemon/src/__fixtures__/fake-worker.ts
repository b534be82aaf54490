import { EventEmitter } from 'node:events';
import readline from 'node:readline';
import { PassThrough } from 'node:stream';
import type { WorkerProcess } from '../worker-channel.js';

export interface WorkerRequestLine {
  _id: string;
  args: string[];
}

function isRequestLine(value: unknown): value is WorkerRequestLine {
  return (
    typeof value === 'object' &&
    value !== null &&
    '_id' in value &&
    typeof value._id === 'string' &&
    'args' in value &&
    Array.isArray(value.args)
  );
}

/** Lines to write back for a request; null stays silent */
export type FakeReply = (request: WorkerRequestLine) => Array<string | object> | object | null;

export interface FakeWorkerOptions {
  reply?: FakeReply;
  /** Emit 'error' instead of 'spawn' */
  spawnError?: Error;
  pid?: number;
}

/** Reply handler that echoes the args back as stdout */
export const echoReply: FakeReply = (request) => ({
  _id: request._id,
  ok: true,
  stdout: `worker ${request.args.join(' ')}`,
  stderr: '',
});

/**
 * In-process stand-in for the tool's persistent worker, speaking the
 * same line-delimited JSON over PassThrough streams.
 */
export class FakeWorker extends EventEmitter implements WorkerProcess {
  readonly pid: number;
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  readonly requests: WorkerRequestLine[] = [];
  readonly signals: NodeJS.Signals[] = [];
  private reply?: FakeReply;

  constructor(options: FakeWorkerOptions = {}) {
    super();
    this.pid = options.pid ?? 4321;
    this.reply = options.reply;

    readline.createInterface({ input: this.stdin }).on('line', (line) => {
      const raw: unknown = JSON.parse(line);
      if (!isRequestLine(raw)) return;
      const request = raw;
      this.requests.push(request);
      const out = this.reply?.(request) ?? null;
      if (out === null) return;
      for (const item of Array.isArray(out) ? out : [out]) {
        this.respond(item);
      }
    });

    setImmediate(() => {
      if (options.spawnError) {
        this.emit('error', options.spawnError);
      } else {
        this.emit('spawn');
      }
    });
  }

  respond(line: string | object): void {
    this.stdout.write(`${typeof line === 'string' ? line : JSON.stringify(line)}\n`);
  }

  /** Simulate the worker dying on its own */
  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.emit('exit', code, signal);
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    setImmediate(() => this.emit('exit', null, signal));
    return true;
  }
}
