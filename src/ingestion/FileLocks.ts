/**
 * File Locking Utilities
 * Lock files that serialize access to state shared between processes, such as
 * the processed-file hash cache
 */

import * as fs from 'fs';
import { z } from 'zod';
import logger from '../utils/logger';
import { FileAccessError, errorMessage, isErrnoException } from '../errors';

export interface LockOptions {
  timeout_ms?: number;
  retry_interval_ms?: number;
  stale_lock_timeout_ms?: number;
}

export interface LockInfo {
  file_path: string;
  lock_path: string;
  acquired_at: string;
  process_id: number;
}

const lockInfoSchema = z.object({
  file_path: z.string(),
  lock_path: z.string(),
  acquired_at: z.string(),
  process_id: z.number(),
});

const DEFAULT_OPTIONS: Required<LockOptions> = {
  timeout_ms: 30000,
  retry_interval_ms: 100,
  stale_lock_timeout_ms: 300000,
};

export class FileLock {
  private readonly filePath: string;
  private readonly lockPath: string;
  private readonly options: Required<LockOptions>;
  private lockInfo: LockInfo | null = null;

  constructor(filePath: string, options: LockOptions = {}) {
    this.filePath = filePath;
    this.lockPath = `${filePath}.lock`;
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Acquire lock on file; false when timeout_ms passes first
   */
  async acquire(): Promise<boolean> {
    const startTime = Date.now();

    while (Date.now() - startTime < this.options.timeout_ms) {
      if (fs.existsSync(this.lockPath)) {
        if (this.isLockStale()) {
          logger.warn('Removing stale lock', { lockPath: this.lockPath });
          this.forceRelease();
        } else {
          await this.sleep(this.options.retry_interval_ms);
          continue;
        }
      }

      const lockInfo: LockInfo = {
        file_path: this.filePath,
        lock_path: this.lockPath,
        acquired_at: new Date().toISOString(),
        process_id: process.pid,
      };

      try {
        // 'wx' fails if another holder created the file in the meantime
        fs.writeFileSync(this.lockPath, JSON.stringify(lockInfo, null, 2), { flag: 'wx' });
      } catch (error: unknown) {
        if (isErrnoException(error) && error.code === 'EEXIST') {
          await this.sleep(this.options.retry_interval_ms);
          continue;
        }
        logger.error('Error acquiring lock', { error: errorMessage(error), filePath: this.filePath });
        throw FileAccessError.fromNodeError(this.lockPath, error);
      }

      this.lockInfo = lockInfo;
      logger.debug('Lock acquired', { filePath: this.filePath, processId: process.pid });
      return true;
    }

    logger.warn('Lock acquisition timeout', {
      filePath: this.filePath,
      timeoutMs: this.options.timeout_ms,
    });

    return false;
  }

  release(): void {
    if (!this.lockInfo) {
      logger.warn('Attempted to release lock that was not acquired', {
        filePath: this.filePath,
      });
      return;
    }

    if (fs.existsSync(this.lockPath)) {
      fs.unlinkSync(this.lockPath);
      logger.debug('Lock released', { filePath: this.filePath });
    }

    this.lockInfo = null;
  }

  forceRelease(): void {
    if (fs.existsSync(this.lockPath)) {
      fs.unlinkSync(this.lockPath);
      logger.info('Lock force released', { filePath: this.filePath });
    }
  }

  isLockStale(): boolean {
    if (!fs.existsSync(this.lockPath)) {
      return false;
    }

    let acquiredAt: number;
    try {
      const parsed = lockInfoSchema.safeParse(JSON.parse(fs.readFileSync(this.lockPath, 'utf-8')));
      // unreadable lock contents count as stale
      if (!parsed.success) return true;
      acquiredAt = new Date(parsed.data.acquired_at).getTime();
    } catch (error: unknown) {
      logger.warn('Unreadable lock file', { lockPath: this.lockPath, error: errorMessage(error) });
      return true;
    }

    const lockAge = Date.now() - acquiredAt;
    if (Number.isNaN(lockAge) || lockAge > this.options.stale_lock_timeout_ms) {
      logger.warn('Stale lock detected', {
        lockPath: this.lockPath,
        lockAgeMs: lockAge,
        threshold: this.options.stale_lock_timeout_ms,
      });
      return true;
    }

    return false;
  }

  is_locked(): boolean {
    return this.lockInfo !== null;
  }

  /**
   * Execute callback with lock held
   */
  async with_lock<T>(callback: () => Promise<T>): Promise<T> {
    const acquired = await this.acquire();

    if (!acquired) {
      throw FileAccessError.lockFailed(this.filePath, this.options.timeout_ms);
    }

    try {
      return await callback();
    } finally {
      this.release();
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Helper function for simple lock operations
 */
export async function with_file_lock<T>(
  filePath: string,
  callback: () => Promise<T>,
  options: LockOptions = {}
): Promise<T> {
  const lock = new FileLock(filePath, options);
  return lock.with_lock(callback);
}
