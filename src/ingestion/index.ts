/**
 * Ingestion Module - Export Index
 * Exports all ingestion components for easy import
 */

export { MboxReader, MboxRecord, ReaderState, MboxReaderOptions, unescapeFromLine } from './MboxReader';
export { BatchEmitter, BatchEmitterOptions, EmitterState } from './BatchEmitter';
export {
  MemoryThrottle,
  MemoryThrottleOptions,
  MemoryUsageProvider,
  SystemMemoryProvider,
} from './MemoryMonitor';
export { FileLock, LockOptions, LockInfo, with_file_lock } from './FileLocks';
export { FileHashCache, FileProcessingState, computeFileHash } from './FileHashCache';
export { ThreadGrouping, groupByThread, summarizeThread } from './threadGroups';
export {
  IngestionOrchestrator,
  IngestionMetrics,
  IngestionOptions,
  IngestionResult,
  IngestionStatus,
  OrchestratorDependencies,
  ThreadStats,
} from './IngestionOrchestrator';
export { DEFAULT_INGESTION_CONFIG, getIngestionConfig, loadIngestionConfigFromEnv, IngestionConfig } from '../config/ingestion';
