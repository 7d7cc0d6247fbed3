/**
 * Mbox Reader
 * Streams raw message records out of an mbox file one at a time, so only the
 * record being assembled is held in memory
 */

import { createReadStream, promises as fsp } from 'fs';
import { createInterface } from 'readline';
import logger from '../utils/logger';
import { FileAccessError } from '../errors';

export interface MboxRecord {
  /** Zero-based position of the record in the file */
  index: number;
  /** The `From ` separator line, empty for a preamble before the first one */
  separator: string;
  /** Header block and body, separator removed, `>From ` lines unescaped */
  raw: string;
}

export interface ReaderState {
  records_read: number;
  bytes_read: number;
}

export interface MboxReaderOptions {
  buffer_size_kb?: number;
}

const SEPARATOR = 'From ';

export class MboxReader {
  private readonly filePath: string;
  private readonly bufferSizeKB: number;
  private recordsRead = 0;
  private bytesRead = 0;

  constructor(filePath: string, options: MboxReaderOptions = {}) {
    this.filePath = filePath;
    this.bufferSizeKB = options.buffer_size_kb || 64;
  }

  /**
   * Yield records in file order
   */
  async *records(): AsyncGenerator<MboxRecord, void, unknown> {
    await this.assertReadable();

    const stream = createReadStream(this.filePath, {
      encoding: 'utf-8',
      highWaterMark: this.bufferSizeKB * 1024,
    });
    const failure: { error?: Error } = {};
    stream.on('error', (error) => {
      failure.error = error;
    });

    const rl = createInterface({
      input: stream,
      crlfDelay: Infinity,
    });

    let separator = '';
    let lines: string[] = [];
    let index = 0;

    try {
      for await (const line of rl) {
        this.bytesRead += Buffer.byteLength(line, 'utf-8') + 1;

        if (line.startsWith(SEPARATOR)) {
          const record = this.buildRecord(index, separator, lines);
          if (record) {
            index++;
            yield record;
          }
          separator = line;
          lines = [];
          continue;
        }

        lines.push(line);
      }

      const last = this.buildRecord(index, separator, lines);
      if (last) {
        yield last;
      }
    } finally {
      rl.close();
      stream.destroy();
    }

    if (failure.error) {
      throw FileAccessError.fromNodeError(this.filePath, failure.error);
    }

    logger.debug('Mbox read complete', {
      file: this.filePath,
      records: this.recordsRead,
      bytes: this.bytesRead,
    });
  }

  getState(): ReaderState {
    return {
      records_read: this.recordsRead,
      bytes_read: this.bytesRead,
    };
  }

  private buildRecord(index: number, separator: string, lines: string[]): MboxRecord | null {
    // A preamble before the first separator is only a record if it has content
    if (!separator && lines.every((line) => line.trim().length === 0)) {
      return null;
    }

    this.recordsRead++;
    return {
      index,
      separator,
      raw: lines.map(unescapeFromLine).join('\n'),
    };
  }

  private async assertReadable(): Promise<void> {
    try {
      const stats = await fsp.stat(this.filePath);
      if (!stats.isFile()) {
        throw FileAccessError.readFailed(this.filePath, new Error('not a regular file'));
      }
      await fsp.access(this.filePath, fsp.constants.R_OK);
    } catch (error: unknown) {
      throw FileAccessError.fromNodeError(this.filePath, error);
    }
  }
}

/**
 * `>From ` (and `>>From ` ...) loses one quoting level
 */
export function unescapeFromLine(line: string): string {
  return /^>+From /.test(line) ? line.slice(1) : line;
}
