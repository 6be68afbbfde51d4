/**
 * Promotion Lock
 * ==============
 * Cross-process mutual exclusion for the copy + registry transition sequence.
 *
 * The lock is a file created with O_EXCL next to the production artifact.
 * A lock older than `staleMs` belongs to a crashed run and is replaced:
 * it is first renamed to a unique tombstone, and only the run whose rename
 * moved that exact file (same inode) may create the new lock.
 */

import type { Stats } from 'node:fs';
import fs, { type FileHandle } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { PromotionInProgressError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';

export interface LockOwner {
  id: string;
  pid: number;
  host: string;
  acquiredAt: string;
}

export interface PromotionLockConfig {
  staleMs: number;
  logger?: Logger;
}

function hasCode(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

export class PromotionLock {
  constructor(
    readonly lockPath: string,
    private readonly config: PromotionLockConfig
  ) {}

  /**
   * Run `fn` while holding the lock. Throws PromotionInProgressError when a
   * live lock is held by someone else.
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const owner = await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release(owner);
    }
  }

  async acquire(): Promise<LockOwner> {
    const owner: LockOwner = {
      id: uuidv4(),
      pid: process.pid,
      host: os.hostname(),
      acquiredAt: new Date().toISOString(),
    };

    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
    if (await this.tryCreate(owner)) return owner;

    const current = await this.inspect();
    if (current.ino === null) {
      // Released between our create attempt and now.
      if (await this.tryCreate(owner)) return owner;
    } else if (current.stale) {
      this.config.logger?.warn({ lockPath: this.lockPath }, 'Replacing stale promotion lock');
      if ((await this.evict(current.ino)) && (await this.tryCreate(owner))) return owner;
    }

    throw new PromotionInProgressError(this.lockPath);
  }

  async release(owner: LockOwner): Promise<void> {
    const current = await this.readOwner();
    if (current && current.id !== owner.id) {
      this.config.logger?.warn(
        { lockPath: this.lockPath, holder: current.id },
        'Promotion lock was taken over, leaving it in place'
      );
      return;
    }
    await fs.rm(this.lockPath, { force: true });
  }

  private async tryCreate(owner: LockOwner): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await fs.open(this.lockPath, 'wx');
    } catch (err) {
      if (hasCode(err, 'EEXIST')) return false;
      throw err;
    }
    try {
      await handle.writeFile(JSON.stringify(owner));
    } finally {
      await handle.close();
    }
    return true;
  }

  private async readOwner(): Promise<LockOwner | null> {
    let text: string;
    try {
      text = await fs.readFile(this.lockPath, 'utf-8');
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return null;
      throw err;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === 'object' && parsed !== null && 'id' in parsed && typeof parsed.id === 'string') {
        return {
          id: parsed.id,
          pid: 'pid' in parsed && typeof parsed.pid === 'number' ? parsed.pid : -1,
          host: 'host' in parsed && typeof parsed.host === 'string' ? parsed.host : 'unknown',
          acquiredAt: 'acquiredAt' in parsed && typeof parsed.acquiredAt === 'string' ? parsed.acquiredAt : '',
        };
      }
    } catch (err) {
      this.config.logger?.warn({ lockPath: this.lockPath, err }, 'Unreadable promotion lock file');
    }
    return null;
  }

  private async inspect(): Promise<{ ino: number | null; stale: boolean }> {
    let stat: Stats;
    try {
      stat = await fs.stat(this.lockPath);
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return { ino: null, stale: false };
      throw err;
    }
    const owner = await this.readOwner();
    const acquired = owner ? Date.parse(owner.acquiredAt) : NaN;
    const since = Number.isFinite(acquired) ? acquired : stat.mtimeMs;
    return { ino: stat.ino, stale: Date.now() - since > this.config.staleMs };
  }

  /**
   * Move the stale lock with inode `ino` out of the way. Returns false when
   * the file at the lock path was already a fresh lock from another run; that
   * lock is put back.
   */
  private async evict(ino: number): Promise<boolean> {
    const tombstone = `${this.lockPath}.${uuidv4()}.stale`;
    try {
      await fs.rename(this.lockPath, tombstone);
    } catch (err) {
      if (hasCode(err, 'ENOENT')) return true;
      throw err;
    }

    const moved = await fs.stat(tombstone);
    if (moved.ino === ino) {
      await fs.rm(tombstone, { force: true });
      return true;
    }

    try {
      await fs.link(tombstone, this.lockPath);
    } catch (err) {
      if (!hasCode(err, 'EEXIST')) throw err;
    } finally {
      await fs.rm(tombstone, { force: true });
    }
    return false;
  }
}
