/**
 * HTTP client for the relay's Unix socket.
 */

import http from 'node:http';
import type { z } from 'zod';
import {
  ExecuteResultSchema,
  HealthResponseSchema,
  MetricsResponseSchema,
  type ExecuteResult,
  type HealthResponse,
  type MetricsResponse,
} from '@hookd/config';
import { RelayNotRunningError, TimeoutError } from '@hookd/utils';

export interface RelayClientOptions {
  socketPath: string;
  /** Per-request timeout (default: 5000ms) */
  timeoutMs?: number;
}

interface RawResponse {
  status: number;
  body: unknown;
}

const UNREACHABLE_CODES = new Set(['ENOENT', 'ECONNREFUSED', 'ECONNRESET', 'EPIPE']);

function isUnreachable(err: unknown): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && UNREACHABLE_CODES.has(err.code);
}

export class RelayClient {
  readonly socketPath: string;
  private timeoutMs: number;

  constructor(options: RelayClientOptions) {
    this.socketPath = options.socketPath;
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  /** Health response, or null when the relay does not answer */
  async health(): Promise<HealthResponse | null> {
    return this.probe('/health', HealthResponseSchema);
  }

  async metrics(): Promise<MetricsResponse | null> {
    return this.probe('/metrics', MetricsResponseSchema);
  }

  /**
   * Relay one tool call. Rejects with RelayNotRunningError when nothing is
   * listening, so callers can fall back to a direct invocation.
   */
  async execute(args: string[], timeoutMs?: number): Promise<ExecuteResult> {
    let response: RawResponse;
    try {
      response = await this.request('POST', '/execute', { args }, timeoutMs);
    } catch (err) {
      if (isUnreachable(err)) {
        throw new RelayNotRunningError();
      }
      throw err;
    }

    const parsed = ExecuteResultSchema.safeParse(response.body);
    if (!parsed.success) {
      return { ok: false, stdout: '', stderr: `Unexpected relay response (HTTP ${response.status})` };
    }
    return parsed.data;
  }

  private async probe<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T | null> {
    try {
      const response = await this.request('GET', path);
      if (response.status !== 200) return null;
      const parsed = schema.safeParse(response.body);
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  private request(method: 'GET' | 'POST', path: string, body?: unknown, timeoutMs?: number): Promise<RawResponse> {
    const timeout = timeoutMs ?? this.timeoutMs;
    const payload = body === undefined ? undefined : JSON.stringify(body);

    return new Promise<RawResponse>((resolve, reject) => {
      const req = http.request(
        {
          socketPath: this.socketPath,
          path,
          method,
          headers: payload
            ? { 'Content-Type': 'application/json', 'Content-Length': Buffer.byteLength(payload) }
            : undefined,
        },
        (res) => {
          const chunks: Buffer[] = [];
          res.on('data', (chunk: Buffer) => chunks.push(chunk));
          res.on('end', () => {
            const text = Buffer.concat(chunks).toString('utf-8');
            let parsed: unknown = null;
            try {
              parsed = text ? JSON.parse(text) : null;
            } catch {
              parsed = text;
            }
            resolve({ status: res.statusCode ?? 0, body: parsed });
          });
          res.on('error', reject);
        },
      );

      req.setTimeout(timeout, () => {
        req.destroy(new TimeoutError(`${method} ${path}`, timeout));
      });
      req.on('error', reject);

      if (payload) {
        req.write(payload);
      }
      req.end();
    });
  }
}
