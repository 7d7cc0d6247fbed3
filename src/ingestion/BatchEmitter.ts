/**
 * Batch Emitter
 * Parses the records of one mailbox and yields them in bounded batches, in
 * source order. Malformed records are logged, counted and left out.
 */

import path from 'path';
import logger from '../utils/logger';
import { EmailParser } from '../parsing/EmailParser';
import { NormalizedMessage } from '../parsing/types';
import { ValidationError, errorMessage, isDomainError } from '../errors';
import { MboxReader } from './MboxReader';
import { MemoryUsageProvider, SystemMemoryProvider } from './MemoryMonitor';

export interface BatchEmitterOptions {
  parser?: EmailParser;
  memoryProvider?: MemoryUsageProvider;
  maxMemoryPercent?: number;
}

export interface EmitterState {
  source: string | null;
  records_read: number;
  messages_emitted: number;
  batches_emitted: number;
  parse_errors: number;
  last_memory_percent: number | null;
}

export class BatchEmitter implements MemoryUsageProvider {
  private readonly parser: EmailParser;
  private readonly memoryProvider: MemoryUsageProvider;
  private readonly maxMemoryPercent: number;
  private state: EmitterState = BatchEmitter.emptyState(null);

  constructor(options: BatchEmitterOptions = {}) {
    this.parser = options.parser ?? new EmailParser();
    this.memoryProvider = options.memoryProvider ?? new SystemMemoryProvider();
    this.maxMemoryPercent = options.maxMemoryPercent ?? 80;
  }

  /**
   * Lazily yield batches of at most batchSize parsed messages from an mbox
   * file. Not seekable; call again to restart from the beginning.
   */
  async *streamBatches(
    source: string,
    batchSize: number
  ): AsyncGenerator<NormalizedMessage[], void, unknown> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw ValidationError.invalidOption('batchSize', batchSize, 'a positive integer');
    }

    this.state = BatchEmitter.emptyState(source);
    const fileName = path.basename(source);
    const reader = new MboxReader(source);
    let batch: NormalizedMessage[] = [];

    for await (const record of reader.records()) {
      this.state.records_read++;

      try {
        batch.push(await this.parser.parse(record.raw));
      } catch (error: unknown) {
        this.state.parse_errors++;
        logger.warn('Skipping malformed message', {
          file: fileName,
          recordIndex: record.index,
          code: isDomainError(error) ? error.code : undefined,
          error: errorMessage(error),
        });
        continue;
      }

      if (batch.length >= batchSize) {
        yield this.emit(batch);
        batch = [];
      }
    }

    if (batch.length > 0) {
      yield this.emit(batch);
    }

    logger.info('Finished reading mailbox', {
      file: fileName,
      records: this.state.records_read,
      messages: this.state.messages_emitted,
      batches: this.state.batches_emitted,
      parseErrors: this.state.parse_errors,
    });
  }

  /**
   * Current memory usage; the orchestrator polls this between batches
   */
  getUsagePercent(): number {
    const usage = this.memoryProvider.getUsagePercent();
    this.state.last_memory_percent = usage;
    return usage;
  }

  isUnderPressure(): boolean {
    return this.getUsagePercent() > this.maxMemoryPercent;
  }

  getState(): EmitterState {
    return { ...this.state };
  }

  private emit(batch: NormalizedMessage[]): NormalizedMessage[] {
    this.state.batches_emitted++;
    this.state.messages_emitted += batch.length;

    if (this.isUnderPressure()) {
      logger.warn('Memory pressure reported before batch hand-off', {
        file: this.state.source ? path.basename(this.state.source) : undefined,
        batch: this.state.batches_emitted,
        usagePercent: this.state.last_memory_percent,
        maxPercent: this.maxMemoryPercent,
      });
    }

    logger.debug('Emitting batch', {
      batch: this.state.batches_emitted,
      size: batch.length,
      total: this.state.messages_emitted,
    });

    return batch;
  }

  private static emptyState(source: string | null): EmitterState {
    return {
      source,
      records_read: 0,
      messages_emitted: 0,
      batches_emitted: 0,
      parse_errors: 0,
      last_memory_percent: null,
    };
  }
}
