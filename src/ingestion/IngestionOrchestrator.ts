/**
 * Ingestion Orchestrator
 * Walks a directory of mailbox files, skips the ones whose content hash is
 * unchanged, streams the rest in batches through the thread identifier and
 * hands them to storage. Recoverable failures are counted and the run goes
 * on; a missing directory or lasting memory pressure ends it.
 *
 * Events:
 *   run:start, file:start, file:skipped, file:complete, file:error,
 *   batch:stored, run:complete
 */

import { EventEmitter } from 'events';
import { promises as fsp } from 'fs';
import * as path from 'path';
import logger from '../utils/logger';
import { IngestionConfig, loadIngestionConfigFromEnv } from '../config/ingestion';
import {
  DirectoryError,
  DomainError,
  MemoryPressureError,
  StorageError,
  ValidationError,
  errorMessage,
  isDomainError,
  isErrnoException,
  toError,
  wrapError,
} from '../errors';
import { EmailParser } from '../parsing/EmailParser';
import { ThreadIdentifier } from '../parsing/ThreadIdentifier';
import { NormalizedMessage } from '../parsing/types';
import { EmailStorage } from '../storage/types';
import { BatchEmitter } from './BatchEmitter';
import { FileHashCache, computeFileHash } from './FileHashCache';
import { MemoryThrottle, MemoryUsageProvider, SystemMemoryProvider } from './MemoryMonitor';
import { groupByThread, summarizeThread } from './threadGroups';

export type IngestionStatus = 0 | 1 | 2;

export interface IngestionMetrics {
  files_found: number;
  files_processed: number;
  files_skipped: number;
  files_failed: number;
  messages_processed: number;
  messages_inserted: number;
  parse_errors: number;
  batches_processed: number;
  batches_failed: number;
  storage_errors: number;
  memory_waits: number;
  thread_count: number;
  emails_grouped: number;
  elapsed_ms: number;
}

export interface ThreadStats {
  thread_count: number;
  emails_grouped: number;
}

export interface IngestionResult {
  /** 0 completed, 1 directory problem, 2 stopped by memory pressure */
  status: IngestionStatus;
  metrics: IngestionMetrics;
  thread_stats: ThreadStats | null;
  error?: DomainError;
}

export interface IngestionOptions {
  batchSize?: number;
  dryRun?: boolean;
  useThreading?: boolean;
  extensions?: string[];
  skipUnchanged?: boolean;
  maxMemoryPercent?: number;
  /** Share one identifier across runs so thread ids stay stable */
  threadIdentifier?: ThreadIdentifier;
}

export interface OrchestratorDependencies {
  storage?: EmailStorage | null;
  hashCache?: FileHashCache;
  threadIdentifier?: ThreadIdentifier;
  parser?: EmailParser;
  memoryProvider?: MemoryUsageProvider;
  config?: IngestionConfig;
  sleep?: (ms: number) => Promise<void>;
}

interface RunContext {
  metrics: IngestionMetrics;
  identifier: ThreadIdentifier;
  emitter: BatchEmitter;
  throttle: MemoryThrottle;
  batchSize: number;
  dryRun: boolean;
  useThreading: boolean;
  skipUnchanged: boolean;
}

interface StorageUnit {
  label: string;
  size: number;
  write: () => Promise<number>;
}

export class IngestionOrchestrator extends EventEmitter {
  private readonly storage: EmailStorage | null;
  private readonly hashCache: FileHashCache;
  private readonly threadIdentifier: ThreadIdentifier;
  private readonly parser: EmailParser;
  private readonly memoryProvider: MemoryUsageProvider;
  private readonly config: IngestionConfig;
  private readonly sleep?: (ms: number) => Promise<void>;
  private isRunning = false;

  constructor(deps: OrchestratorDependencies = {}) {
    super();
    this.config = deps.config ?? loadIngestionConfigFromEnv();
    this.storage = deps.storage ?? null;
    this.hashCache = deps.hashCache ?? new FileHashCache();
    this.threadIdentifier = deps.threadIdentifier ?? new ThreadIdentifier();
    this.parser = deps.parser ?? new EmailParser({ keywords: this.config.parsing.keywords });
    this.memoryProvider = deps.memoryProvider ?? new SystemMemoryProvider();
    this.sleep = deps.sleep;
  }

  /**
   * Ingest every matching mailbox in a directory (not recursive)
   */
  async processDirectory(directory: string, options: IngestionOptions = {}): Promise<IngestionResult> {
    if (this.isRunning) {
      throw new Error('Ingestion is already running');
    }

    const settings = this.config.ingestion;
    const dryRun = options.dryRun ?? settings.dry_run;
    const useThreading = options.useThreading ?? settings.use_threading;
    const batchSize = options.batchSize ?? settings.batch_size;
    const extensions = (options.extensions ?? settings.extensions).map(normalizeExtension);

    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw ValidationError.invalidOption('batchSize', batchSize, 'a positive integer');
    }
    if (!dryRun && !this.storage) {
      throw new ValidationError('A storage backend is required unless dryRun is set', 'storage');
    }

    const maxMemoryPercent = options.maxMemoryPercent ?? this.config.memory.max_percent;
    const context: RunContext = {
      metrics: emptyMetrics(),
      identifier: options.threadIdentifier ?? this.threadIdentifier,
      emitter: new BatchEmitter({
        parser: this.parser,
        memoryProvider: this.memoryProvider,
        maxMemoryPercent,
      }),
      throttle: new MemoryThrottle(this.memoryProvider, {
        max_percent: maxMemoryPercent,
        retry_interval_ms: this.config.memory.retry_interval_ms,
        max_wait_attempts: this.config.memory.max_wait_attempts,
        ...(this.sleep ? { sleep: this.sleep } : {}),
      }),
      batchSize,
      dryRun,
      useThreading,
      skipUnchanged: options.skipUnchanged ?? settings.skip_unchanged,
    };

    this.isRunning = true;
    const startTime = Date.now();
    let status: IngestionStatus = 0;
    let failure: DomainError | undefined;

    logger.info('Starting mailbox ingestion', { directory, batchSize, dryRun, useThreading });
    this.emit('run:start', { directory, dryRun, useThreading });

    try {
      const files = await this.discoverFiles(directory, extensions);
      context.metrics.files_found = files.length;

      for (let i = 0; i < files.length; i++) {
        const filePath = files[i];
        const fileName = path.basename(filePath);

        context.metrics.memory_waits += await context.throttle.waitForCapacity(`before ${fileName}`);
        this.emit('file:start', { filePath, index: i, total: files.length });

        try {
          await this.processFile(filePath, context);
        } catch (error: unknown) {
          if (error instanceof MemoryPressureError) {
            throw error;
          }
          context.metrics.files_failed++;
          const domainError = wrapError(error);
          logger.error('Failed to process mailbox', { file: fileName, ...domainError.toJSON() });
          this.emit('file:error', { filePath, error: domainError });
        }
      }
    } catch (error: unknown) {
      if (error instanceof DirectoryError) {
        status = 1;
        failure = error;
        logger.error('Cannot ingest directory', error.toJSON());
      } else if (error instanceof MemoryPressureError) {
        status = 2;
        failure = error;
        logger.error('Stopping ingestion: memory pressure persisted', error.toJSON());
      } else {
        this.isRunning = false;
        throw error;
      }
    }

    if (!dryRun) {
      await this.persistHashCache();
    }

    const metrics = context.metrics;
    metrics.thread_count = context.identifier.getThreadCount();
    metrics.elapsed_ms = Date.now() - startTime;

    const result: IngestionResult = {
      status,
      metrics,
      thread_stats: useThreading
        ? { thread_count: metrics.thread_count, emails_grouped: metrics.emails_grouped }
        : null,
      ...(failure ? { error: failure } : {}),
    };

    this.isRunning = false;

    logger.info('Mailbox ingestion complete', { status, ...metrics });
    this.emit('run:complete', result);

    return result;
  }

  private async processFile(filePath: string, context: RunContext): Promise<void> {
    const fileName = path.basename(filePath);
    const { metrics, emitter } = context;

    const contentHash = await computeFileHash(filePath);
    if (context.skipUnchanged && this.hashCache.isUnchanged(filePath, contentHash)) {
      metrics.files_skipped++;
      logger.info('Skipping unchanged mailbox', { file: fileName });
      this.emit('file:skipped', { filePath, contentHash });
      return;
    }

    logger.info('Processing mailbox', { file: fileName });
    let batchIndex = 0;
    let failedBatches = 0;

    try {
      for await (const batch of emitter.streamBatches(filePath, context.batchSize)) {
        batchIndex++;
        metrics.messages_processed += batch.length;
        if (!(await this.handleBatch(batch, fileName, batchIndex, context))) {
          failedBatches++;
        }
        metrics.memory_waits += await context.throttle.waitForCapacity(`${fileName} batch ${batchIndex}`);
      }
    } finally {
      metrics.parse_errors += emitter.getState().parse_errors;
    }

    // a file is only marked done once every batch reached storage
    if (failedBatches > 0) {
      logger.warn('Mailbox left for the next run after storage failures', { file: fileName, failedBatches });
    } else if (!context.dryRun) {
      this.hashCache.record(filePath, contentHash);
    }

    metrics.files_processed++;
    logger.info('Mailbox complete', { file: fileName, batches: batchIndex, failedBatches });
    this.emit('file:complete', { filePath, batches: batchIndex, failedBatches });
  }

  /**
   * Store one batch, each thread group as its own unit. Returns false when
   * any unit or the thread merges failed to store.
   */
  private async handleBatch(
    batch: NormalizedMessage[],
    fileName: string,
    batchIndex: number,
    context: RunContext
  ): Promise<boolean> {
    const { metrics, identifier } = context;
    const storage = this.storage;

    if (context.dryRun || !storage) {
      if (context.useThreading) {
        const { unthreaded } = groupByThread(batch, identifier);
        identifier.drainMerges();
        metrics.emails_grouped += batch.length - unthreaded.length;
      }
      metrics.messages_inserted += batch.length;
      metrics.batches_processed++;
      return true;
    }

    const units: StorageUnit[] = [];
    if (context.useThreading) {
      const { groups, unthreaded } = groupByThread(batch, identifier);
      metrics.emails_grouped += batch.length - unthreaded.length;

      for (const [threadId, messages] of groups) {
        units.push({
          label: threadId,
          size: messages.length,
          write: async () => {
            const inserted = await storage.insert(messages);
            await storage.upsertThread(summarizeThread(threadId, messages));
            return inserted;
          },
        });
      }
      if (unthreaded.length > 0) {
        units.push({ label: 'unthreaded', size: unthreaded.length, write: () => storage.insert(unthreaded) });
      }
    } else {
      units.push({
        label: 'batch',
        size: batch.length,
        write: () => storage.insert(batch.map((message) => ({ ...message, thread_id: null }))),
      });
    }

    let inserted = 0;
    let failedUnits = 0;
    for (const unit of units) {
      try {
        inserted += await unit.write();
      } catch (error: unknown) {
        failedUnits++;
        this.recordStorageFailure(
          error instanceof StorageError ? error : StorageError.insertFailed(unit.size, toError(error)),
          { file: fileName, batchIndex, unit: unit.label },
          metrics
        );
      }
    }

    // unions go out even when a group failed
    if (context.useThreading) {
      const merges = identifier.drainMerges();
      if (merges.length > 0) {
        try {
          await storage.mergeThreads(merges);
        } catch (error: unknown) {
          failedUnits++;
          identifier.requeueMerges(merges);
          this.recordStorageFailure(
            error instanceof StorageError ? error : StorageError.mergeFailed(merges.length, toError(error)),
            { file: fileName, batchIndex, unit: 'merges' },
            metrics
          );
        }
      }
    }

    metrics.messages_inserted += inserted;
    if (failedUnits > 0) {
      metrics.batches_failed++;
      return false;
    }

    metrics.batches_processed++;
    this.emit('batch:stored', { file: fileName, batchIndex, size: batch.length, inserted });
    return true;
  }

  private recordStorageFailure(
    error: StorageError,
    location: { file: string; batchIndex: number; unit: string },
    metrics: IngestionMetrics
  ): void {
    metrics.storage_errors++;
    logger.error('Failed to store batch', { ...location, ...error.toJSON() });
  }

  private async discoverFiles(directory: string, extensions: string[]): Promise<string[]> {
    try {
      const stats = await fsp.stat(directory);
      if (!stats.isDirectory()) {
        throw DirectoryError.notADirectory(directory);
      }
    } catch (error: unknown) {
      if (isDomainError(error)) throw error;
      if (isErrnoException(error) && error.code === 'ENOENT') {
        throw DirectoryError.notFound(directory);
      }
      throw DirectoryError.unreadable(directory, toError(error));
    }

    let entries: string[];
    try {
      const dirents = await fsp.readdir(directory, { withFileTypes: true });
      entries = dirents.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch (error: unknown) {
      throw DirectoryError.unreadable(directory, toError(error));
    }

    const files = entries
      .filter((name) => extensions.includes(path.extname(name).toLowerCase()))
      .sort()
      .map((name) => path.join(directory, name));

    if (files.length === 0) {
      throw DirectoryError.noMatchingFiles(directory, extensions);
    }

    logger.info('Mailboxes found', { directory, count: files.length });
    return files;
  }

  private async persistHashCache(): Promise<void> {
    try {
      await this.hashCache.save();
    } catch (error: unknown) {
      logger.error('Failed to save file hash cache', { error: errorMessage(error) });
    }
  }
}

function normalizeExtension(ext: string): string {
  return (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase();
}

function emptyMetrics(): IngestionMetrics {
  return {
    files_found: 0,
    files_processed: 0,
    files_skipped: 0,
    files_failed: 0,
    messages_processed: 0,
    messages_inserted: 0,
    parse_errors: 0,
    batches_processed: 0,
    batches_failed: 0,
    storage_errors: 0,
    memory_waits: 0,
    thread_count: 0,
    emails_grouped: 0,
    elapsed_ms: 0,
  };
}
