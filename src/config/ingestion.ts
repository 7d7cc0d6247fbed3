/**
 * Ingestion Configuration
 * Centralized defaults for mailbox ingestion, batching and memory backoff
 */

import { config } from './index';

export interface IngestionConfig {
  ingestion: {
    batch_size: number;
    extensions: string[];
    use_threading: boolean;
    skip_unchanged: boolean;
    dry_run: boolean;
  };
  parsing: {
    keywords: string[];
  };
  memory: {
    max_percent: number;
    retry_interval_ms: number;
    max_wait_attempts: number;
  };
  file_locks: {
    timeout_ms: number;
    retry_interval_ms: number;
    stale_lock_timeout_ms: number;
  };
}

export const DEFAULT_INGESTION_CONFIG: IngestionConfig = {
  ingestion: {
    batch_size: 100,
    extensions: ['.mbox'],
    use_threading: true,
    skip_unchanged: true,
    dry_run: false,
  },
  parsing: {
    keywords: ['urgent', 'legal', 'contract'],
  },
  memory: {
    max_percent: 80,
    retry_interval_ms: 5000,
    max_wait_attempts: 60,
  },
  file_locks: {
    timeout_ms: 30000,
    retry_interval_ms: 100,
    stale_lock_timeout_ms: 300000,
  },
};

export type IngestionConfigOverrides = {
  [K in keyof IngestionConfig]?: Partial<IngestionConfig[K]>;
};

/**
 * Get ingestion config with overrides
 */
export function getIngestionConfig(
  overrides?: IngestionConfigOverrides
): IngestionConfig {
  if (!overrides) {
    return DEFAULT_INGESTION_CONFIG;
  }

  return {
    ingestion: {
      ...DEFAULT_INGESTION_CONFIG.ingestion,
      ...(overrides.ingestion || {}),
    },
    parsing: {
      ...DEFAULT_INGESTION_CONFIG.parsing,
      ...(overrides.parsing || {}),
    },
    memory: {
      ...DEFAULT_INGESTION_CONFIG.memory,
      ...(overrides.memory || {}),
    },
    file_locks: {
      ...DEFAULT_INGESTION_CONFIG.file_locks,
      ...(overrides.file_locks || {}),
    },
  };
}

/**
 * Environment-based configuration loader
 */
export function loadIngestionConfigFromEnv(): IngestionConfig {
  return getIngestionConfig({
    ingestion: {
      batch_size: config.batchSize,
      extensions: config.mailboxExtensions,
    },
    parsing: {
      keywords: config.keywords,
    },
    memory: {
      max_percent: config.memory.maxPercent,
      retry_interval_ms: config.memory.retryIntervalMs,
      max_wait_attempts: config.memory.maxWaitAttempts,
    },
  });
}
