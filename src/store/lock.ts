import * as fs from 'node:fs/promises';
import { StoreError, errnoCode, logger } from '../utils/index.js';

const STALE_LOCK_MS = 30000;

/** Exclusive lock file; a lock older than 30 seconds is treated as abandoned. */
export class FileLock {
  readonly lockPath: string;

  constructor(lockPath: string) {
    this.lockPath = lockPath;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  private async acquire(): Promise<void> {
    try {
      await fs.writeFile(this.lockPath, process.pid.toString(), { flag: 'wx' });
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') throw err;
      if (await this.isStale()) {
        await this.removeStaleLock();
        await fs.writeFile(this.lockPath, process.pid.toString(), { flag: 'wx' });
        return;
      }
      throw new StoreError(`Store is locked by another operation: ${this.lockPath}`);
    }
  }

  private async isStale(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.lockPath);
      return Date.now() - stat.mtimeMs > STALE_LOCK_MS;
    } catch (err) {
      // Released between our write attempt and the stat
      if (errnoCode(err) === 'ENOENT') return true;
      throw err;
    }
  }

  private async removeStaleLock(): Promise<void> {
    try {
      await fs.unlink(this.lockPath);
    } catch (err) {
      // Already released by its holder
      if (errnoCode(err) !== 'ENOENT') throw err;
    }
  }

  private async release(): Promise<void> {
    try {
      await fs.unlink(this.lockPath);
    } catch (err) {
      logger.warn('Failed to release lock', this.lockPath, err);
    }
  }
}
