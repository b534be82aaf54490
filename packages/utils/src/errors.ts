/**
 * Error Types for hookd
 *
 * Single source of truth for typed error classes shared by the relay,
 * registry, scheduler and CLI.
 */

export class HookdError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HookdError';
  }
}

export class RelayNotRunningError extends HookdError {
  constructor(message?: string) {
    super(message || 'Relay server is not running. Start with: hookd watchdog start');
    this.name = 'RelayNotRunningError';
  }
}

export class TimeoutError extends HookdError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

export class WorkerExitedError extends HookdError {
  constructor(
    public readonly code: number | null,
    public readonly signal: string | null
  ) {
    super(`Persistent worker process exited (code=${code ?? 'null'}, signal=${signal ?? 'null'})`);
    this.name = 'WorkerExitedError';
  }
}

export class WorkerUnavailableError extends HookdError {
  constructor(reason: string = 'not started') {
    super(`Persistent worker unavailable: ${reason}`);
    this.name = 'WorkerUnavailableError';
  }
}

export class InvalidRequestError extends HookdError {
  constructor(detail: string) {
    super(`invalid request: ${detail}`);
    this.name = 'InvalidRequestError';
  }
}

export class ConfigError extends HookdError {
  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
    this.name = 'ConfigError';
  }
}

/**
 * Normalize an unknown thrown value to a message for logs and responses.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
