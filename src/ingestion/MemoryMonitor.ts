/**
 * Memory pressure probing and the cooperative backoff applied between batches
 */

import os from 'os';
import logger from '../utils/logger';
import { MemoryPressureError, ValidationError } from '../errors';

/**
 * Source of the current system memory usage, as a percentage
 */
export interface MemoryUsageProvider {
  getUsagePercent(): number;
}

export class SystemMemoryProvider implements MemoryUsageProvider {
  getUsagePercent(): number {
    const total = os.totalmem();
    if (total <= 0) {
      return 0;
    }
    return ((total - os.freemem()) / total) * 100;
  }
}

export interface MemoryThrottleOptions {
  max_percent: number;
  retry_interval_ms: number;
  max_wait_attempts: number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export class MemoryThrottle {
  private readonly provider: MemoryUsageProvider;
  private readonly options: Required<MemoryThrottleOptions>;

  constructor(provider: MemoryUsageProvider, options: MemoryThrottleOptions) {
    if (!(options.max_percent > 0 && options.max_percent <= 100)) {
      throw ValidationError.invalidOption('max_percent', options.max_percent, 'a percentage in (0, 100]');
    }
    this.provider = provider;
    this.options = { sleep: defaultSleep, ...options };
  }

  get maxPercent(): number {
    return this.options.max_percent;
  }

  isUnderPressure(): boolean {
    return this.provider.getUsagePercent() > this.options.max_percent;
  }

  /**
   * Poll until usage drops to the ceiling. Resolves with the number of waits;
   * rejects with MemoryPressureError once max_wait_attempts waits did not help.
   */
  async waitForCapacity(context: string): Promise<number> {
    let usage = this.provider.getUsagePercent();
    let waits = 0;

    while (usage > this.options.max_percent) {
      if (waits >= this.options.max_wait_attempts) {
        throw new MemoryPressureError(usage, this.options.max_percent, waits);
      }

      logger.warn('Memory usage above threshold, pausing', {
        context,
        usagePercent: Number(usage.toFixed(1)),
        maxPercent: this.options.max_percent,
        attempt: waits + 1,
      });

      await this.options.sleep(this.options.retry_interval_ms);
      waits++;
      usage = this.provider.getUsagePercent();
    }

    if (waits > 0) {
      logger.info('Memory usage back under threshold, resuming', { context, waits });
    }

    return waits;
  }
}
