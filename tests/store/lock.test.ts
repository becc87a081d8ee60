import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { FileLock } from '../../src/store/lock.js';
import { StoreError } from '../../src/utils/errors.js';
import { createTempDir } from '../helpers.js';

const hooks = vi.hoisted(() => {
  const state: { beforeStat?: () => Promise<void> } = {};
  return state;
});

// Lets a test release the lock between the failed create and the staleness check.
vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    stat: async (...args: Parameters<typeof actual.stat>) => {
      const hook = hooks.beforeStat;
      hooks.beforeStat = undefined;
      await hook?.();
      return actual.stat(...args);
    },
  };
});

let dir: string;
let cleanup: () => Promise<void>;
let lockPath: string;

beforeEach(async () => {
  ({ dir, cleanup } = await createTempDir());
  lockPath = path.join(dir, '.test.lock');
});

afterEach(async () => {
  hooks.beforeStat = undefined;
  await cleanup();
});

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

describe('FileLock', () => {
  it('should hold the lock file while the callback runs', async () => {
    const lock = new FileLock(lockPath);

    const held = await lock.withLock(async () => exists(lockPath));
    expect(held).toBe(true);
    expect(await exists(lockPath)).toBe(false);
  });

  it('should release the lock when the callback throws', async () => {
    const lock = new FileLock(lockPath);

    await expect(lock.withLock(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(await exists(lockPath)).toBe(false);
  });

  it('should refuse a lock held by another operation', async () => {
    await fs.writeFile(lockPath, '12345');

    await expect(new FileLock(lockPath).withLock(async () => 'ran')).rejects.toThrow(StoreError);
    expect(await fs.readFile(lockPath, 'utf-8')).toBe('12345');
  });

  it('should take over a lock released just before the staleness check', async () => {
    await fs.writeFile(lockPath, '12345');
    hooks.beforeStat = () => fs.unlink(lockPath);

    expect(await new FileLock(lockPath).withLock(async () => 'ran')).toBe('ran');
    expect(await exists(lockPath)).toBe(false);
  });
});
