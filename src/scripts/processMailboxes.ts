#!/usr/bin/env node
/**
 * Ingest a directory of mailbox files into the SQLite store.
 *
 *   processMailboxes --directory ./data --batch-size 200 --dry-run
 *
 * Exits with the run status: 0 done, 1 directory problem or failed backup,
 * 2 memory pressure.
 */

import path from 'path';
import logger, { setLogLevel } from '../utils/logger';
import { config } from '../config';
import { loadIngestionConfigFromEnv } from '../config/ingestion';
import { ValidationError, errorMessage } from '../errors';
import { FileHashCache } from '../ingestion/FileHashCache';
import { IngestionOrchestrator, IngestionResult } from '../ingestion/IngestionOrchestrator';
import { SqliteEmailStore } from '../storage/SqliteEmailStore';
import { backupDatabase } from '../storage/backup';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

export interface CliOptions {
  directory?: string;
  batchSize?: number;
  dryRun?: boolean;
  useThreading?: boolean;
  database?: string;
  logLevel?: LogLevel;
  force?: boolean;
  backup?: boolean;
  help?: boolean;
}

const USAGE = `Usage: processMailboxes [options]

  -d, --directory <path>   Directory of mailbox files (default: MAILBOX_DIRECTORY)
      --batch-size <n>     Messages per batch (default: BATCH_SIZE)
      --dry-run            Parse and thread without writing to the database
      --no-threads         Store messages without thread identification
      --database <file>    SQLite database file (default: DATABASE_FILE)
      --log-level <level>  error | warn | info | debug
      --force              Re-process files even when their hash is unchanged
      --backup             Copy the database to <file>.<epoch>.bak before the run
  -h, --help               Show this help`;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function parseArgs(args: string[] = process.argv.slice(2)): CliOptions {
  const options: CliOptions = {};

  const valueOf = (flag: string, index: number): string => {
    const value = args[index + 1];
    if (value === undefined || value.startsWith('--')) {
      throw new ValidationError(`Missing value for ${flag}`, flag);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--directory' || arg === '-d') {
      options.directory = valueOf(arg, i++);
    } else if (arg === '--batch-size') {
      const raw = valueOf(arg, i++);
      const batchSize = Number(raw);
      if (!Number.isInteger(batchSize) || batchSize < 1) {
        throw ValidationError.invalidOption('--batch-size', raw, 'a positive integer');
      }
      options.batchSize = batchSize;
    } else if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--no-threads') {
      options.useThreading = false;
    } else if (arg === '--database') {
      options.database = valueOf(arg, i++);
    } else if (arg === '--log-level') {
      const level = valueOf(arg, i++);
      if (!isLogLevel(level)) {
        throw ValidationError.invalidOption('--log-level', level, LOG_LEVELS.join(' | '));
      }
      options.logLevel = level;
    } else if (arg === '--force') {
      options.force = true;
    } else if (arg === '--backup') {
      options.backup = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new ValidationError(`Unknown option: ${arg}`, arg);
    }
  }

  return options;
}

export function formatSummary(result: IngestionResult): string[] {
  const { metrics } = result;
  const lines = [
    '=== Ingestion Summary ===',
    `Status: ${result.status}`,
    `Files: ${metrics.files_found} found, ${metrics.files_processed} processed, ${metrics.files_skipped} skipped, ${metrics.files_failed} failed`,
    `Messages: ${metrics.messages_processed} parsed, ${metrics.messages_inserted} inserted, ${metrics.parse_errors} malformed`,
    `Batches: ${metrics.batches_processed} stored, ${metrics.batches_failed} failed`,
    `Memory waits: ${metrics.memory_waits}`,
    `Elapsed: ${(metrics.elapsed_ms / 1000).toFixed(2)}s`,
  ];

  if (metrics.messages_processed > 0 && metrics.elapsed_ms > 0) {
    const perSecond = metrics.messages_processed / (metrics.elapsed_ms / 1000);
    lines.push(`Throughput: ${perSecond.toFixed(2)} messages/s`);
  }

  if (result.thread_stats) {
    lines.push(
      `Threads: ${result.thread_stats.thread_count}, messages grouped: ${result.thread_stats.emails_grouped}`
    );
  }
  if (result.error) {
    lines.push(`Error: ${result.error.toUserMessage()}`);
  }

  return lines;
}

export async function main(options: CliOptions = parseArgs()): Promise<number> {
  if (options.help) {
    console.log(USAGE);
    return 0;
  }
  if (options.logLevel) {
    setLogLevel(options.logLevel);
  }

  const ingestionConfig = loadIngestionConfigFromEnv();
  const directory = path.resolve(options.directory ?? config.mailboxDirectory);
  const databaseFile = options.database ?? config.databaseFile;

  if (options.backup) {
    try {
      backupDatabase(databaseFile);
    } catch (error: unknown) {
      logger.error('Database backup failed, aborting', { error: errorMessage(error) });
      return 1;
    }
  }

  const storage = options.dryRun ? null : new SqliteEmailStore(databaseFile);
  const hashCache = FileHashCache.load(config.fileCachePath, ingestionConfig.file_locks);

  const orchestrator = new IngestionOrchestrator({
    storage,
    hashCache,
    config: ingestionConfig,
  });

  try {
    const result = await orchestrator.processDirectory(directory, {
      batchSize: options.batchSize,
      dryRun: options.dryRun,
      useThreading: options.useThreading,
      skipUnchanged: options.force ? false : undefined,
    });

    for (const line of formatSummary(result)) {
      logger.info(line);
    }

    return result.status;
  } finally {
    await storage?.close();
  }
}

if (require.main === module) {
  main()
    .then((status) => {
      process.exitCode = status;
    })
    .catch((error: unknown) => {
      logger.error('Mailbox ingestion failed', { error: errorMessage(error) });
      process.exit(1);
    });
}
