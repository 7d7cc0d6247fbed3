/**
 * File Hash Cache
 * Remembers the content hash of every mailbox that finished processing, so an
 * unchanged file is skipped on the next run. Optionally persisted as JSON.
 */

import crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import logger from '../utils/logger';
import { FileAccessError, errorMessage } from '../errors';
import { LockOptions, with_file_lock } from './FileLocks';

export interface FileProcessingState {
  path: string;
  content_hash: string;
  processed_at: string;
}

const cacheEntrySchema = z.union([
  z.object({
    content_hash: z.string(),
    processed_at: z.string(),
  }),
  // older cache files map path -> hash directly
  z.string().transform((content_hash) => ({ content_hash, processed_at: '' })),
]);

const cacheFileSchema = z.record(z.string(), cacheEntrySchema);

type CacheEntry = Omit<FileProcessingState, 'path'>;

/**
 * sha256 of a file's bytes, streamed
 */
export function computeFileHash(filePath: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = crypto.createHash('sha256');
    const stream = fs.createReadStream(filePath);

    stream.on('data', (data) => hash.update(data));
    stream.on('end', () => resolve(hash.digest('hex')));
    stream.on('error', (error) => reject(FileAccessError.fromNodeError(filePath, error)));
  });
}

export class FileHashCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly cachePath: string | null;
  private readonly lockOptions: LockOptions;

  constructor(cachePath: string | null = null, lockOptions: LockOptions = {}) {
    this.cachePath = cachePath;
    this.lockOptions = lockOptions;
  }

  /**
   * Load a persisted cache. A missing file gives an empty cache; an unreadable
   * or invalid one is logged and ignored.
   */
  static load(cachePath: string, lockOptions: LockOptions = {}): FileHashCache {
    const cache = new FileHashCache(cachePath, lockOptions);
    for (const [filePath, entry] of Object.entries(FileHashCache.readFile(cachePath))) {
      cache.entries.set(filePath, entry);
    }

    logger.debug('File hash cache loaded', { cachePath, entries: cache.size });
    return cache;
  }

  isUnchanged(filePath: string, contentHash: string): boolean {
    return this.entries.get(path.resolve(filePath))?.content_hash === contentHash;
  }

  record(filePath: string, contentHash: string): FileProcessingState {
    const state: FileProcessingState = {
      path: path.resolve(filePath),
      content_hash: contentHash,
      processed_at: new Date().toISOString(),
    };
    this.entries.set(state.path, {
      content_hash: state.content_hash,
      processed_at: state.processed_at,
    });
    return state;
  }

  get(filePath: string): FileProcessingState | null {
    const resolved = path.resolve(filePath);
    const entry = this.entries.get(resolved);
    return entry ? { path: resolved, ...entry } : null;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Write the cache atomically (temp file + rename) while holding the cache
   * lock. Entries written by other instances in the meantime are kept; ours
   * win on conflict. No-op for an in-memory cache.
   */
  async save(): Promise<void> {
    const cachePath = this.cachePath;
    if (!cachePath) {
      return;
    }

    fs.mkdirSync(path.dirname(path.resolve(cachePath)), { recursive: true });

    await with_file_lock(
      cachePath,
      async () => {
        const merged: Record<string, CacheEntry> = {
          ...FileHashCache.readFile(cachePath),
          ...Object.fromEntries(this.entries),
        };

        const tempPath = `${cachePath}.${process.pid}.tmp`;
        try {
          fs.writeFileSync(tempPath, JSON.stringify(merged, null, 2), 'utf-8');
          fs.renameSync(tempPath, cachePath);
        } catch (error: unknown) {
          if (fs.existsSync(tempPath)) {
            fs.unlinkSync(tempPath);
          }
          throw FileAccessError.fromNodeError(cachePath, error);
        }

        logger.debug('File hash cache saved', {
          cachePath,
          entries: Object.keys(merged).length,
        });
      },
      this.lockOptions
    );
  }

  private static readFile(cachePath: string): Record<string, CacheEntry> {
    if (!fs.existsSync(cachePath)) {
      return {};
    }

    try {
      const parsed = cacheFileSchema.safeParse(JSON.parse(fs.readFileSync(cachePath, 'utf-8')));
      if (parsed.success) {
        return parsed.data;
      }
      logger.warn('Ignoring invalid file hash cache', {
        cachePath,
        issues: parsed.error.issues.length,
      });
    } catch (error: unknown) {
      logger.warn('Ignoring unreadable file hash cache', { cachePath, error: errorMessage(error) });
    }

    return {};
  }
}
