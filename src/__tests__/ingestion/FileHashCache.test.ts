/**
 * Unit Tests for FileHashCache
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import logger from '../../utils/logger';
import { FileHashCache, computeFileHash } from '../../ingestion/FileHashCache';
import { createTempDir, removeTempDir } from '../fixtures/createTestMbox';

describe('FileHashCache', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(tempDir);
  });

  describe('computeFileHash', () => {
    it('should return the sha256 of the file bytes', async () => {
      const filePath = path.join(tempDir, 'a.mbox');
      fs.writeFileSync(filePath, 'mailbox contents');

      const expected = crypto.createHash('sha256').update('mailbox contents').digest('hex');
      await expect(computeFileHash(filePath)).resolves.toBe(expected);
    });

    it('should fail with a FileAccessError for a missing file', async () => {
      await expect(computeFileHash(path.join(tempDir, 'missing.mbox'))).rejects.toMatchObject({
        code: 'FILE_001',
      });
    });
  });

  it('should report unchanged only for a recorded hash', () => {
    const cache = new FileHashCache();
    const filePath = path.join(tempDir, 'a.mbox');

    expect(cache.isUnchanged(filePath, 'abc')).toBe(false);
    cache.record(filePath, 'abc');
    expect(cache.isUnchanged(filePath, 'abc')).toBe(true);
    expect(cache.isUnchanged(filePath, 'def')).toBe(false);
    expect(cache.get(filePath)).toMatchObject({ path: path.resolve(filePath), content_hash: 'abc' });
  });

  it('should key entries by resolved path', () => {
    const cache = new FileHashCache();
    cache.record(path.join(tempDir, 'sub', '..', 'a.mbox'), 'abc');

    expect(cache.isUnchanged(path.join(tempDir, 'a.mbox'), 'abc')).toBe(true);
    expect(cache.size).toBe(1);
  });

  it('should round-trip through its JSON file', async () => {
    const cachePath = path.join(tempDir, 'state', 'processed_files.json');
    const cache = FileHashCache.load(cachePath);
    cache.record(path.join(tempDir, 'a.mbox'), 'abc');

    await cache.save();

    const reloaded = FileHashCache.load(cachePath);
    expect(reloaded.isUnchanged(path.join(tempDir, 'a.mbox'), 'abc')).toBe(true);
    expect(fs.existsSync(`${cachePath}.lock`)).toBe(false);
    expect(fs.readdirSync(path.dirname(cachePath))).toEqual(['processed_files.json']);
  });

  it('should keep entries saved by another instance', async () => {
    const cachePath = path.join(tempDir, 'processed_files.json');
    const first = FileHashCache.load(cachePath);
    const second = FileHashCache.load(cachePath);

    first.record(path.join(tempDir, 'a.mbox'), 'aaa');
    second.record(path.join(tempDir, 'b.mbox'), 'bbb');
    await first.save();
    await second.save();

    const merged = FileHashCache.load(cachePath);
    expect(merged.size).toBe(2);
    expect(merged.isUnchanged(path.join(tempDir, 'a.mbox'), 'aaa')).toBe(true);
  });

  it('should accept entries that are plain hash strings', () => {
    const cachePath = path.join(tempDir, 'legacy.json');
    const filePath = path.resolve(tempDir, 'old.mbox');
    fs.writeFileSync(cachePath, JSON.stringify({ [filePath]: 'cafe' }));

    const cache = FileHashCache.load(cachePath);

    expect(cache.isUnchanged(filePath, 'cafe')).toBe(true);
  });

  it('should start empty when the cache file is corrupt', () => {
    const cachePath = path.join(tempDir, 'corrupt.json');
    fs.writeFileSync(cachePath, '{not json');

    const cache = FileHashCache.load(cachePath);

    expect(cache.size).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      'Ignoring unreadable file hash cache',
      expect.objectContaining({ cachePath })
    );
  });

  it('should do nothing on save without a cache path', async () => {
    const cache = new FileHashCache();
    cache.record(path.join(tempDir, 'a.mbox'), 'abc');

    await cache.save();

    expect(fs.readdirSync(tempDir)).toEqual([]);
  });
});
