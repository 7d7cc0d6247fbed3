import fs from 'fs';
import path from 'path';
import logger from '../../utils/logger';
import { formatSummary, main, parseArgs } from '../../scripts/processMailboxes';
import { IngestionResult } from '../../ingestion/IngestionOrchestrator';
import { SqliteEmailStore } from '../../storage/SqliteEmailStore';
import { DirectoryError, ValidationError } from '../../errors';
import { createSampleMbox, createTempDir, removeTempDir, writeMboxToFile } from '../fixtures/createTestMbox';

const sampleMetrics = {
  files_found: 2,
  files_processed: 1,
  files_skipped: 1,
  files_failed: 0,
  messages_processed: 5,
  messages_inserted: 4,
  parse_errors: 1,
  batches_processed: 3,
  batches_failed: 0,
  storage_errors: 0,
  memory_waits: 0,
  thread_count: 2,
  emails_grouped: 4,
  elapsed_ms: 1500,
};

describe('processMailboxes', () => {
  describe('parseArgs', () => {
    it('should read every flag', () => {
      expect(
        parseArgs([
          '-d',
          './in',
          '--batch-size',
          '25',
          '--dry-run',
          '--no-threads',
          '--database',
          'out.db',
          '--log-level',
          'debug',
          '--force',
          '--backup',
        ])
      ).toEqual({
        directory: './in',
        batchSize: 25,
        dryRun: true,
        useThreading: false,
        database: 'out.db',
        logLevel: 'debug',
        force: true,
        backup: true,
      });
    });

    it('should reject a non-positive batch size', () => {
      expect(() => parseArgs(['--batch-size', '0'])).toThrow(ValidationError);
      expect(() => parseArgs(['--batch-size', '1.5'])).toThrow('Invalid value for --batch-size');
    });

    it('should reject an unknown log level', () => {
      expect(() => parseArgs(['--log-level', 'verbose'])).toThrow(ValidationError);
    });

    it('should reject a flag without its value', () => {
      expect(() => parseArgs(['--directory'])).toThrow('Missing value for --directory');
      expect(() => parseArgs(['--database', '--dry-run'])).toThrow('Missing value for --database');
    });

    it('should reject unknown flags', () => {
      expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    });
  });

  describe('formatSummary', () => {
    it('should report counters, threads and errors', () => {
      const result: IngestionResult = {
        status: 1,
        metrics: sampleMetrics,
        thread_stats: { thread_count: 2, emails_grouped: 4 },
        error: DirectoryError.notFound('/in'),
      };

      expect(formatSummary(result)).toEqual([
        '=== Ingestion Summary ===',
        'Status: 1',
        'Files: 2 found, 1 processed, 1 skipped, 0 failed',
        'Messages: 5 parsed, 4 inserted, 1 malformed',
        'Batches: 3 stored, 0 failed',
        'Memory waits: 0',
        'Elapsed: 1.50s',
        'Throughput: 3.33 messages/s',
        'Threads: 2, messages grouped: 4',
        'Error: Error DIR_001: Directory does not exist: /in',
      ]);
    });

    it('should leave out thread lines without thread stats', () => {
      const lines = formatSummary({ status: 0, metrics: sampleMetrics, thread_stats: null });

      expect(lines).toHaveLength(8);
    });

    it('should leave out throughput when nothing was parsed', () => {
      const lines = formatSummary({
        status: 0,
        metrics: { ...sampleMetrics, messages_processed: 0 },
        thread_stats: null,
      });

      expect(lines.some((line) => line.startsWith('Throughput'))).toBe(false);
    });
  });

  describe('main', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTempDir();
      writeMboxToFile(createSampleMbox(3), path.join(tempDir, 'inbox', 'a.mbox'));
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it('should ingest a directory into the database', async () => {
      const database = path.join(tempDir, 'emails.db');

      const status = await main({ directory: path.join(tempDir, 'inbox'), database, force: true });

      expect(status).toBe(0);
      expect(logger.info).toHaveBeenCalledWith('Status: 0');

      const store = new SqliteEmailStore(database);
      expect(store.countEmails()).toBe(3);
      await store.close();
    });

    it('should not create a database on a dry run', async () => {
      const database = path.join(tempDir, 'emails.db');

      const status = await main({ directory: path.join(tempDir, 'inbox'), database, dryRun: true });

      expect(status).toBe(0);
      expect(logger.info).toHaveBeenCalledWith('Messages: 3 parsed, 3 inserted, 0 malformed');
      expect(fs.existsSync(database)).toBe(false);
    });

    it('should back up an existing database before the run', async () => {
      const database = path.join(tempDir, 'emails.db');
      await new SqliteEmailStore(database).close();

      const status = await main({ directory: path.join(tempDir, 'inbox'), database, backup: true, force: true });

      expect(status).toBe(0);
      expect(fs.readdirSync(tempDir).filter((name) => /^emails\.db\.\d+\.bak$/.test(name))).toHaveLength(1);
    });

    it('should abort with status 1 when the backup fails', async () => {
      const database = path.join(tempDir, 'emails.db');
      await new SqliteEmailStore(database).close();
      fs.mkdirSync(`${database}.1700000000.bak`);
      const now = jest.spyOn(Date, 'now').mockReturnValue(1700000000000);

      try {
        const status = await main({ directory: path.join(tempDir, 'inbox'), database, backup: true, force: true });

        expect(status).toBe(1);
        expect(logger.error).toHaveBeenCalledWith('Database backup failed, aborting', expect.any(Object));
      } finally {
        now.mockRestore();
      }

      const store = new SqliteEmailStore(database);
      expect(store.countEmails()).toBe(0);
      await store.close();
    });

    it('should return 1 for a missing directory', async () => {
      await expect(main({ directory: path.join(tempDir, 'missing'), dryRun: true })).resolves.toBe(1);
    });
  });
});
