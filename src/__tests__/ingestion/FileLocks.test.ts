/**
 * Unit Tests for FileLock
 */

import * as fs from 'fs';
import * as path from 'path';
import { FileLock, with_file_lock } from '../../ingestion/FileLocks';
import { FileAccessError } from '../../errors';
import { createTempDir, removeTempDir } from '../fixtures/createTestMbox';

describe('FileLock', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  it('should acquire and release a lock file', async () => {
    const target = path.join(tempDir, 'state.json');
    const lock = new FileLock(target);

    await expect(lock.acquire()).resolves.toBe(true);
    expect(lock.is_locked()).toBe(true);
    expect(fs.existsSync(`${target}.lock`)).toBe(true);

    lock.release();
    expect(lock.is_locked()).toBe(false);
    expect(fs.existsSync(`${target}.lock`)).toBe(false);
  });

  it('should time out while another holder has the lock', async () => {
    const target = path.join(tempDir, 'state.json');
    const holder = new FileLock(target);
    await holder.acquire();

    const waiter = new FileLock(target, { timeout_ms: 50, retry_interval_ms: 10 });
    await expect(waiter.acquire()).resolves.toBe(false);

    holder.release();
  });

  it('should take over a stale lock', async () => {
    const target = path.join(tempDir, 'state.json');
    fs.writeFileSync(
      `${target}.lock`,
      JSON.stringify({
        file_path: target,
        lock_path: `${target}.lock`,
        acquired_at: '2020-01-01T00:00:00.000Z',
        process_id: 1,
      })
    );

    const lock = new FileLock(target, { stale_lock_timeout_ms: 1000 });

    expect(lock.isLockStale()).toBe(true);
    await expect(lock.acquire()).resolves.toBe(true);
    lock.release();
  });

  it('should treat an unparseable lock file as stale', () => {
    const target = path.join(tempDir, 'state.json');
    fs.writeFileSync(`${target}.lock`, 'garbage');

    expect(new FileLock(target).isLockStale()).toBe(true);
  });

  it('should raise FILE_004 from with_file_lock when the lock is busy', async () => {
    const target = path.join(tempDir, 'state.json');
    const holder = new FileLock(target);
    await holder.acquire();

    const callback = jest.fn(async () => 'never');
    await expect(
      with_file_lock(target, callback, { timeout_ms: 30, retry_interval_ms: 10 })
    ).rejects.toBeInstanceOf(FileAccessError);
    expect(callback).not.toHaveBeenCalled();

    holder.release();
  });

  it('should release the lock when the callback throws', async () => {
    const target = path.join(tempDir, 'state.json');

    await expect(
      with_file_lock(target, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(fs.existsSync(`${target}.lock`)).toBe(false);
  });
});
