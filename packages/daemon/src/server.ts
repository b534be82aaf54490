/**
 * Relay Server
 *
 * Singleton HTTP service on a Unix socket that multiplexes tool calls onto
 * one persistent worker, falling back to one-shot subprocesses.
 *
 *   COLD -> LOCK_ACQUIRING -> LOCK_DENIED
 *                          -> LOCKED -> LISTENING -> WORKER_STARTING -> WORKER_READY
 *                                                 -> WORKER_UNAVAILABLE
 *        -> SERVING -> SHUTTING_DOWN -> STOPPED
 */

import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import http from 'node:http';
import express, { type ErrorRequestHandler, type NextFunction, type Request, type Response } from 'express';
import { ExecuteRequestSchema, type CliConfig, type ExecuteResult, type MetricsResponse, type RelayConfig } from '@hookd/config';
import type { ProcessTable } from '@hookd/resiliency';
import { errorMessage, InvalidRequestError, relayLog as log, resolveCommand } from '@hookd/utils';
import { Executor } from './executor.js';
import { RelayLock } from './lock.js';
import { RelayMetrics } from './metrics.js';
import type { OneShotRunner } from './one-shot.js';
import { removeSocketFile } from './socket-file.js';
import { WorkerChannel, type WorkerSpawner } from './worker-channel.js';

export type RelayState =
  | 'COLD'
  | 'LOCK_ACQUIRING'
  | 'LOCK_DENIED'
  | 'LOCKED'
  | 'LISTENING'
  | 'WORKER_STARTING'
  | 'WORKER_READY'
  | 'WORKER_UNAVAILABLE'
  | 'SERVING'
  | 'SHUTTING_DOWN'
  | 'STOPPED';

export type StartOutcome = { status: 'serving' } | { status: 'denied'; ownerPid: number | null };

export interface RelayServerOptions {
  relay: RelayConfig;
  cli: CliConfig;
  /** Liveness probe for the lock owner */
  processTable?: ProcessTable;
  spawnWorker?: WorkerSpawner;
  runOneShot?: OneShotRunner;
  /** Locate the tool executable; null disables the persistent worker */
  resolveCommand?: (command: string) => string | null;
  pid?: number;
  now?: () => number;
}

const EXECUTE_PATHS = ['/execute', '/hook'];

function invalidBody(stderr: string): ExecuteResult {
  return { ok: false, stdout: '', stderr };
}

export class RelayServer extends EventEmitter {
  private readonly options: RelayServerOptions;
  private readonly lock: RelayLock;
  private readonly metrics: RelayMetrics;
  private readonly executor: Executor;
  private readonly now: () => number;
  private readonly pid: number;
  private channel: WorkerChannel | null = null;
  private server?: http.Server;
  private _state: RelayState = 'COLD';
  private stopPromise?: Promise<void>;

  constructor(options: RelayServerOptions) {
    super();
    this.options = options;
    this.now = options.now ?? Date.now;
    this.pid = options.pid ?? process.pid;
    this.lock = new RelayLock(options.relay.lockPath, { pid: this.pid, processTable: options.processTable });
    this.metrics = new RelayMetrics(this.now);
    this.executor = new Executor({
      channel: () => this.channel,
      command: options.cli.command,
      prefixArgs: options.cli.prefixArgs,
      spawnTimeoutMs: options.relay.spawnTimeoutMs,
      metrics: this.metrics,
      runOneShot: options.runOneShot,
    });
  }

  get state(): RelayState {
    return this._state;
  }

  get socketPath(): string {
    return this.options.relay.socketPath;
  }

  private transition(next: RelayState): void {
    const prev = this._state;
    this._state = next;
    log.info(`State ${prev} -> ${next}`);
    this.emit('state', next, prev);
  }

  /**
   * Acquire the lock, listen, start the worker. Resolves `denied` when a
   * live instance already holds the lock. Rejects when the socket cannot
   * be bound; the lock is released first.
   */
  async start(): Promise<StartOutcome> {
    if (this._state !== 'COLD') {
      throw new Error(`Relay already started (state ${this._state})`);
    }

    this.transition('LOCK_ACQUIRING');
    const lock = await this.lock.acquire();
    if (lock.status === 'denied') {
      log.info('Another relay holds the lock', { ownerPid: lock.ownerPid, lockPath: this.lock.lockPath });
      this.transition('LOCK_DENIED');
      return { status: 'denied', ownerPid: lock.ownerPid };
    }
    if (lock.reclaimedFrom !== null) {
      log.info('Reclaimed stale lock', { previousPid: lock.reclaimedFrom });
    }
    this.transition('LOCKED');

    try {
      await this.listen();
    } catch (err) {
      log.error('Failed to listen', { socketPath: this.socketPath, error: errorMessage(err) });
      await this.lock.release();
      this.transition('STOPPED');
      throw err;
    }
    this.transition('LISTENING');

    await this.startWorker();
    this.transition('SERVING');
    return { status: 'serving' };
  }

  /** Idempotent; concurrent callers share one shutdown */
  stop(): Promise<void> {
    if (!this.stopPromise) {
      this.stopPromise = this.shutdown();
    }
    return this.stopPromise;
  }

  metricsSnapshot(): MetricsResponse {
    return this.metrics.snapshot({
      persistentCliActive: this.channel?.available ?? false,
      pendingRequests: this.channel?.pendingCount ?? 0,
      pid: this.pid,
    });
  }

  createApp(): express.Express {
    const app = express();
    app.disable('x-powered-by');
    app.use(express.json({ limit: this.options.relay.bodyLimit }));

    app.post(EXECUTE_PATHS, (req: Request, res: Response, next: NextFunction) => {
      this.handleExecute(req, res).catch(next);
    });

    app.get('/metrics', (_req: Request, res: Response) => {
      res.json(this.metricsSnapshot());
    });

    app.get('/health', (_req: Request, res: Response) => {
      res.json({ ok: true, pid: this.pid });
    });

    const onError: ErrorRequestHandler = (err: unknown, req, res, _next) => {
      const status = err instanceof Error && 'status' in err && typeof err.status === 'number' ? err.status : 500;
      const isExecute = EXECUTE_PATHS.includes(req.path);

      if (status >= 400 && status < 500) {
        // Body parser rejected the payload before any route ran
        if (isExecute) this.metrics.recordCall(false, 0);
        res.status(400).json(invalidBody(new InvalidRequestError(errorMessage(err)).message));
        return;
      }

      log.error('Unhandled request error', { path: req.path, error: errorMessage(err) });
      if (isExecute) this.metrics.recordCall(false, 0);
      res.status(500).json(invalidBody(errorMessage(err)));
    };
    app.use(onError);

    return app;
  }

  private async handleExecute(req: Request, res: Response): Promise<void> {
    const startedAt = this.now();

    const parsed = ExecuteRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      const error = new InvalidRequestError(parsed.error.issues.map((i) => i.message).join('; '));
      this.metrics.recordCall(false, this.now() - startedAt);
      res.status(400).json(invalidBody(error.message));
      return;
    }

    let result: ExecuteResult;
    try {
      result = await this.executor.execute(parsed.data.args);
    } catch (err) {
      log.error('Execute failed', { error: errorMessage(err) });
      result = { ok: false, stdout: '', stderr: errorMessage(err) };
    }

    this.metrics.recordCall(result.ok, this.now() - startedAt);
    res.json(result);
  }

  private async listen(): Promise<void> {
    removeSocketFile(this.socketPath);

    const server = http.createServer(this.createApp());
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      server.once('error', onError);
      server.listen(this.socketPath, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (err) => {
      log.error('Server error', { error: err.message });
    });
    fs.chmodSync(this.socketPath, 0o600);
    this.server = server;
    log.info('Listening', { socketPath: this.socketPath, pid: this.pid });
  }

  private async startWorker(): Promise<void> {
    const { cli, relay } = this.options;
    if (!cli.workerEnabled) {
      log.info('Persistent worker disabled, using one-shot calls');
      this.transition('WORKER_UNAVAILABLE');
      return;
    }

    const resolved = (this.options.resolveCommand ?? resolveCommand)(cli.command);
    if (!resolved) {
      log.warn('Tool executable not found, using one-shot calls', { command: cli.command });
      this.transition('WORKER_UNAVAILABLE');
      return;
    }

    this.transition('WORKER_STARTING');
    const channel = new WorkerChannel({
      command: resolved,
      args: [...cli.prefixArgs, ...cli.workerArgs],
      requestTimeoutMs: relay.requestTimeoutMs,
      spawn: this.options.spawnWorker,
    });
    this.channel = channel;
    const ready = await channel.start();
    this.transition(ready ? 'WORKER_READY' : 'WORKER_UNAVAILABLE');
  }

  private async shutdown(): Promise<void> {
    if (this._state === 'STOPPED' || this._state === 'LOCK_DENIED' || this._state === 'COLD') {
      return;
    }
    this.transition('SHUTTING_DOWN');

    this.channel?.stop();

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
        server.closeAllConnections();
      });
    }

    try {
      removeSocketFile(this.socketPath);
    } catch (err) {
      log.warn('Failed to remove socket', { socketPath: this.socketPath, error: errorMessage(err) });
    }
    try {
      await this.lock.release();
    } catch (err) {
      log.warn('Failed to release lock', { lockPath: this.lock.lockPath, error: errorMessage(err) });
    }

    this.transition('STOPPED');
  }
}

export interface ShutdownHooks {
  exit: (code: number) => void;
  proc?: NodeJS.EventEmitter;
}

/**
 * Route termination signals and uncaught faults through one shutdown:
 * signals exit 0, faults exit 1.
 */
export function installShutdownHandlers(server: RelayServer, hooks: ShutdownHooks): () => void {
  const proc = hooks.proc ?? process;
  let exiting = false;

  const finish = (code: number, reason: string, err?: unknown) => {
    if (err !== undefined) {
      log.error('Fatal error, shutting down', { reason, error: errorMessage(err) });
    } else {
      log.info(`Shutting down (${reason})`);
    }
    if (exiting) return;
    exiting = true;
    server
      .stop()
      .catch((stopErr: unknown) => {
        log.error('Shutdown failed', { error: errorMessage(stopErr) });
      })
      .finally(() => hooks.exit(code));
  };

  const onSigint = () => finish(0, 'SIGINT');
  const onSigterm = () => finish(0, 'SIGTERM');
  const onUncaught = (err: unknown) => finish(1, 'uncaughtException', err);
  const onRejection = (err: unknown) => finish(1, 'unhandledRejection', err);

  proc.on('SIGINT', onSigint);
  proc.on('SIGTERM', onSigterm);
  proc.on('uncaughtException', onUncaught);
  proc.on('unhandledRejection', onRejection);

  return () => {
    proc.off('SIGINT', onSigint);
    proc.off('SIGTERM', onSigterm);
    proc.off('uncaughtException', onUncaught);
    proc.off('unhandledRejection', onRejection);
  };
}
