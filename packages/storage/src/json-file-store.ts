import fs from 'node:fs';
import path from 'node:path';
import type { z } from 'zod';
import { createLogger, errorMessage } from '@hookd/utils';

const log = createLogger('storage');

export interface JsonFileStoreOptions<T> {
  filePath: string;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Indentation for the written document (default: 2) */
  indent?: number;
}

export type ReadResult<T> =
  | { status: 'missing' }
  | { status: 'invalid'; error: string }
  | { status: 'ok'; value: T };

/**
 * Single JSON document on disk, validated on every read.
 *
 * Writes go to a sibling temp file and are renamed into place, so readers
 * never observe a half-written document. There is no cross-process lock;
 * callers that need one re-read before writing.
 */
export class JsonFileStore<T> {
  readonly filePath: string;
  private schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  private indent: number;
  private tmpSeq = 0;

  constructor(options: JsonFileStoreOptions<T>) {
    this.filePath = options.filePath;
    this.schema = options.schema;
    this.indent = options.indent ?? 2;
  }

  async load(): Promise<ReadResult<T>> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNotFound(err)) return { status: 'missing' };
      return { status: 'invalid', error: errorMessage(err) };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      return { status: 'invalid', error: errorMessage(err) };
    }

    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      return { status: 'invalid', error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
    }
    return { status: 'ok', value: parsed.data };
  }

  /** The document, or null when it is missing or does not validate */
  async read(): Promise<T | null> {
    const result = await this.load();
    if (result.status === 'invalid') {
      log.warn('Ignoring unreadable document', { file: this.filePath, error: result.error });
      return null;
    }
    return result.status === 'ok' ? result.value : null;
  }

  async write(value: T): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
    const tmpPath = `${this.filePath}.${process.pid}.${++this.tmpSeq}.tmp`;
    try {
      await fs.promises.writeFile(tmpPath, `${JSON.stringify(value, null, this.indent)}\n`, 'utf-8');
      await fs.promises.rename(tmpPath, this.filePath);
    } catch (err) {
      await fs.promises.rm(tmpPath, { force: true });
      throw err;
    }
  }

  async delete(): Promise<boolean> {
    try {
      await fs.promises.unlink(this.filePath);
      return true;
    } catch (err) {
      if (isNotFound(err)) return false;
      throw err;
    }
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
