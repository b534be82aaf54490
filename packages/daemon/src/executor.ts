import type { ExecuteResult } from '@hookd/config';
import { createLogger, errorMessage, TimeoutError } from '@hookd/utils';
import type { RelayMetrics } from './metrics.js';
import { runOneShot, type OneShotRunner } from './one-shot.js';
import type { RequestChannel } from './worker-channel.js';

const log = createLogger('executor');

export interface ExecutorOptions {
  /** Current persistent channel, if any; read on every call */
  channel: () => RequestChannel | null;
  command: string;
  prefixArgs: string[];
  spawnTimeoutMs: number;
  metrics: RelayMetrics;
  runOneShot?: OneShotRunner;
}

/**
 * Routes a call to the persistent worker when it is up, and to a one-shot
 * subprocess otherwise. A worker that is gone or unusable is retried once
 * as a one-shot. A timed-out call is failed for its caller only: the worker
 * may still be running it, so it is never run a second time. An ok=false
 * reply from the worker is the tool's own answer and is kept.
 */
export class Executor {
  private options: ExecutorOptions;
  private oneShot: OneShotRunner;

  constructor(options: ExecutorOptions) {
    this.options = options;
    this.oneShot = options.runOneShot ?? runOneShot;
  }

  async execute(args: string[]): Promise<ExecuteResult> {
    const channel = this.options.channel();
    if (channel?.available) {
      try {
        const result = await channel.request(args);
        this.options.metrics.recordPersistentHit();
        return result;
      } catch (err) {
        if (err instanceof TimeoutError) {
          log.warn('Persistent worker call timed out', { error: err.message });
          return { ok: false, stdout: '', stderr: err.message };
        }
        log.warn('Persistent worker failed, falling back to one-shot', { error: errorMessage(err) });
      }
    }
    return this.runFallback(args);
  }

  private async runFallback(args: string[]): Promise<ExecuteResult> {
    this.options.metrics.recordSpawnFallback();
    const { command, prefixArgs, spawnTimeoutMs } = this.options;
    const result = await this.oneShot(command, [...prefixArgs, ...args], { timeoutMs: spawnTimeoutMs });
    if (!result.ok) {
      log.debug('One-shot call failed', { exitCode: result.exitCode, timedOut: result.timedOut });
    }
    return { ok: result.ok, stdout: result.stdout, stderr: result.stderr };
  }
}
