import { execFile } from 'node:child_process';
import type { ExecuteResult } from '@hookd/config';

export interface OneShotOptions {
  timeoutMs: number;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export interface OneShotResult extends ExecuteResult {
  exitCode: number | null;
  timedOut: boolean;
}

export type OneShotRunner = (command: string, args: string[], options: OneShotOptions) => Promise<OneShotResult>;

const MAX_BUFFER = 10 * 1024 * 1024;

/**
 * Run the tool once and capture its output. Never rejects: spawn
 * failures, non-zero exits and timeouts all come back as ok=false.
 */
export const runOneShot: OneShotRunner = (command, args, options) =>
  new Promise((resolve) => {
    execFile(
      command,
      args,
      {
        encoding: 'utf8',
        timeout: options.timeoutMs,
        maxBuffer: MAX_BUFFER,
        env: options.env ?? process.env,
        cwd: options.cwd,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ ok: true, stdout, stderr, exitCode: 0, timedOut: false });
          return;
        }
        const timedOut = error.killed === true && error.signal === 'SIGTERM';
        const exitCode = typeof error.code === 'number' ? error.code : null;
        const reason = timedOut ? `Timed out after ${options.timeoutMs}ms` : error.message;
        resolve({
          ok: false,
          stdout,
          stderr: stderr || reason,
          exitCode,
          timedOut,
        });
      },
    );
  });
