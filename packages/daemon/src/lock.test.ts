import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { MemoryProcessTable } from '@hookd/resiliency';
import { RelayLock } from './lock.js';

describe('RelayLock', () => {
  let dir: string;
  let lockPath: string;
  let table: MemoryProcessTable;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookd-lock-'));
    lockPath = path.join(dir, 'relay.sock.pid');
    table = new MemoryProcessTable([{ pid: 100, command: 'hookd relay' }]);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('creates the lock with our PID', async () => {
    const lock = new RelayLock(lockPath, { pid: 100, processTable: table });
    expect(await lock.acquire()).toEqual({ status: 'acquired', reclaimedFrom: null });
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe('100\n');
    expect(lock.isHeld).toBe(true);
  });

  it('is denied while the recorded owner is alive', async () => {
    table.add(200, 'hookd relay');
    fs.writeFileSync(lockPath, '200\n');
    const lock = new RelayLock(lockPath, { pid: 100, processTable: table });

    expect(await lock.acquire()).toEqual({ status: 'denied', ownerPid: 200 });
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe('200\n');
    expect(lock.isHeld).toBe(false);
  });

  it('reclaims a lock whose owner is dead', async () => {
    fs.writeFileSync(lockPath, '999\n');
    const lock = new RelayLock(lockPath, { pid: 100, processTable: table });

    expect(await lock.acquire()).toEqual({ status: 'acquired', reclaimedFrom: 999 });
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe('100\n');
  });

  it('reclaims a lock with unreadable content', async () => {
    fs.writeFileSync(lockPath, 'garbage');
    const lock = new RelayLock(lockPath, { pid: 100, processTable: table });
    expect(await lock.acquire()).toEqual({ status: 'acquired', reclaimedFrom: null });
  });

  it('lets exactly one of two concurrent reclaimers win', async () => {
    table.add(101, 'hookd relay');
    fs.writeFileSync(lockPath, '999\n');
    const first = new RelayLock(lockPath, { pid: 100, processTable: table });
    const second = new RelayLock(lockPath, { pid: 101, processTable: table });

    const results = await Promise.all([first.acquire(), second.acquire()]);
    const winners = results.filter((r) => r.status === 'acquired');

    expect(winners).toHaveLength(1);
    const winnerPid = first.isHeld ? 100 : 101;
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe(`${winnerPid}\n`);
    expect(results.find((r) => r.status === 'denied')).toEqual({ status: 'denied', ownerPid: winnerPid });
    expect(fs.readdirSync(dir)).toEqual(['relay.sock.pid']);
  });

  it('puts back a lock whose owner turns out to be alive when claimed', async () => {
    table.add(200, 'hookd relay');
    fs.writeFileSync(lockPath, '200\n');
    vi.spyOn(table, 'isAlive').mockReturnValueOnce(false);
    const lock = new RelayLock(lockPath, { pid: 100, processTable: table });

    expect(await lock.acquire()).toEqual({ status: 'denied', ownerPid: 200 });
    expect(fs.readFileSync(lockPath, 'utf-8')).toBe('200\n');
    expect(fs.readdirSync(dir)).toEqual(['relay.sock.pid']);
  });

  it('releases only a lock that still records our PID', async () => {
    const lock = new RelayLock(lockPath, { pid: 100, processTable: table });
    await lock.acquire();

    fs.writeFileSync(lockPath, '300\n');
    expect(await lock.release()).toBe(false);
    expect(fs.existsSync(lockPath)).toBe(true);

    fs.writeFileSync(lockPath, '100\n');
    expect(await lock.release()).toBe(true);
    expect(fs.existsSync(lockPath)).toBe(false);
  });
});
