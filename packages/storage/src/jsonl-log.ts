import fs from 'node:fs';
import path from 'node:path';
import { createLogger, errorMessage } from '@hookd/utils';

const log = createLogger('storage');

export interface JsonlLogStats {
  entries: number;
  bytes: number;
}

/**
 * Append-only JSON-lines file. Appends are serialized so concurrent
 * callers in one process never interleave partial lines.
 */
export class JsonlLog<T extends object> {
  readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  append(record: T): Promise<void> {
    const line = `${JSON.stringify(record)}\n`;
    const next = this.writeChain.then(async () => {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.appendFile(this.filePath, line, 'utf-8');
    });
    // Keep the chain alive after a failed append
    this.writeChain = next.catch((err: unknown) => {
      log.warn('Failed to append record', { file: this.filePath, error: errorMessage(err) });
    });
    return next;
  }

  async stats(): Promise<JsonlLogStats> {
    let text: string;
    try {
      text = await fs.promises.readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return { entries: 0, bytes: 0 };
      throw err;
    }
    return {
      entries: text.split('\n').filter((line) => line.trim().length > 0).length,
      bytes: Buffer.byteLength(text, 'utf-8'),
    };
  }
}
