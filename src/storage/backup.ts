/**
 * Copy of the SQLite file taken before an ingestion run
 */

import * as fs from 'fs';
import logger from '../utils/logger';
import { FileAccessError, errorMessage } from '../errors';

/**
 * Copy the database to `<db>.<epoch seconds>.bak`. Returns the backup path,
 * or null when there is no database file yet.
 */
export function backupDatabase(dbPath: string, now: number = Date.now()): string | null {
  if (dbPath === ':memory:' || !fs.existsSync(dbPath)) {
    logger.warn('No database file to back up', { dbPath });
    return null;
  }

  const backupPath = `${dbPath}.${Math.floor(now / 1000)}.bak`;
  try {
    fs.copyFileSync(dbPath, backupPath);
  } catch (error: unknown) {
    logger.error('Database backup failed', { dbPath, backupPath, error: errorMessage(error) });
    throw FileAccessError.fromNodeError(backupPath, error);
  }

  logger.info('Database backup created', { backupPath });
  return backupPath;
}
