import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import net from 'node:net';
import os from 'node:os';
import path from 'node:path';
import { removeSocketFile } from './socket-file.js';

describe('removeSocketFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookd-sock-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('returns false when nothing is there', () => {
    expect(removeSocketFile(path.join(dir, 'absent.sock'))).toBe(false);
  });

  it('unlinks a socket file', async () => {
    const socketPath = path.join(dir, 'left.sock');
    const server = net.createServer();
    await new Promise<void>((resolve) => server.listen(socketPath, resolve));

    expect(removeSocketFile(socketPath)).toBe(true);
    expect(fs.existsSync(socketPath)).toBe(false);

    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  it('refuses to unlink a regular file', () => {
    const filePath = path.join(dir, 'plain.sock');
    fs.writeFileSync(filePath, 'data');
    expect(() => removeSocketFile(filePath)).toThrow(`Refusing to unlink non-socket at ${filePath}`);
    expect(fs.existsSync(filePath)).toBe(true);
  });
});
