/**
 * Singleton lock for the relay.
 *
 * The lock file holds the owner's PID and is only ever created exclusively.
 * A lock whose owner is dead is claimed by renaming it aside, then the
 * exclusive create is retried. A claim that turns out to hold a live
 * owner's lock is linked back into place.
 */

import fs from 'node:fs';
import path from 'node:path';
import { readPidFile, SystemProcessTable, type ProcessTable } from '@hookd/resiliency';
import { createLogger } from '@hookd/utils';

const log = createLogger('lock');

export type LockResult =
  | { status: 'acquired'; reclaimedFrom: number | null }
  | { status: 'denied'; ownerPid: number | null };

export interface RelayLockOptions {
  pid?: number;
  processTable?: ProcessTable;
}

const MAX_ATTEMPTS = 3;

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export class RelayLock {
  readonly lockPath: string;
  private pid: number;
  private table: ProcessTable;
  private held = false;

  constructor(lockPath: string, options: RelayLockOptions = {}) {
    this.lockPath = lockPath;
    this.pid = options.pid ?? process.pid;
    this.table = options.processTable ?? new SystemProcessTable();
  }

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<LockResult> {
    await fs.promises.mkdir(path.dirname(this.lockPath), { recursive: true });
    let reclaimedFrom: number | null = null;
    let lastOwner: number | null = null;

    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      try {
        await fs.promises.writeFile(this.lockPath, `${this.pid}\n`, { flag: 'wx', mode: 0o600 });
        this.held = true;
        return { status: 'acquired', reclaimedFrom };
      } catch (err) {
        if (!hasCode(err, 'EEXIST')) throw err;
      }

      const owner = await readPidFile(this.lockPath);
      lastOwner = owner;
      if (this.isLiveOwner(owner)) {
        return { status: 'denied', ownerPid: owner };
      }

      const claimed = await this.claimStale();
      if (claimed === 'gone') {
        continue;
      }
      if (this.isLiveOwner(claimed)) {
        // Another instance replaced the stale lock between our read and the rename
        return { status: 'denied', ownerPid: claimed };
      }
      log.info('Reclaimed stale lock', { lockPath: this.lockPath, previousPid: claimed });
      reclaimedFrom = claimed;
    }

    return { status: 'denied', ownerPid: lastOwner };
  }

  /** Remove the lock file if it still records our PID */
  async release(): Promise<boolean> {
    this.held = false;
    const owner = await readPidFile(this.lockPath);
    if (owner !== this.pid) {
      return false;
    }
    await fs.promises.rm(this.lockPath, { force: true });
    return true;
  }

  private isLiveOwner(owner: number | null): boolean {
    return owner !== null && owner !== this.pid && this.table.isAlive(owner);
  }

  /**
   * Move the current lock file aside and return the PID it held. When that
   * PID is alive the file is linked back. 'gone' means the file had already
   * been removed.
   */
  private async claimStale(): Promise<number | null | 'gone'> {
    const claimPath = `${this.lockPath}.${this.pid}.claim`;
    try {
      await fs.promises.rename(this.lockPath, claimPath);
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return 'gone';
      throw err;
    }

    try {
      const owner = await readPidFile(claimPath);
      if (this.isLiveOwner(owner)) {
        await fs.promises.link(claimPath, this.lockPath).catch((err: unknown) => {
          if (!hasCode(err, 'EEXIST')) throw err;
        });
      }
      return owner;
    } finally {
      await fs.promises.rm(claimPath, { force: true });
    }
  }
}
