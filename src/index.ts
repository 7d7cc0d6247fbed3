/**
 * mailbox-threads
 * Batch ingestion of mailbox archives with thread identification
 */

export * from './errors';
export * from './parsing';
export * from './ingestion';
export * from './storage';
export { config } from './config';
export { default as logger, setLogLevel } from './utils/logger';
