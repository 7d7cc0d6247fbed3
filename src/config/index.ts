import dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables
dotenv.config();

// Environment variables schema
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Input / output locations
  MAILBOX_DIRECTORY: z.string().default('./data'),
  MAILBOX_EXTENSIONS: z.string().default('.mbox'),
  DATABASE_FILE: z.string().default('./emails.db'),
  FILE_CACHE_PATH: z.string().default('./processed_files.json'),

  // Message enrichment
  KEYWORDS: z.string().default('urgent,legal,contract'),

  // Batching and memory backoff
  BATCH_SIZE: z.string().default('100'),
  MAX_MEMORY_PERCENT: z.string().default('80'),
  MEMORY_RETRY_INTERVAL_MS: z.string().default('5000'),
  MEMORY_MAX_WAIT_ATTEMPTS: z.string().default('60'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().default('logs/email_processing.log'),
});

// Parse and validate environment variables
const env = envSchema.parse(process.env);

const parseList = (value?: string) =>
  value
    ?.split(',')
    .map((entry) => entry.trim())
    .filter(Boolean) ?? [];

const normalizeExtension = (ext: string) =>
  (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase();

// Export typed configuration
export const config = {
  env: env.NODE_ENV,

  mailboxDirectory: env.MAILBOX_DIRECTORY,
  mailboxExtensions: parseList(env.MAILBOX_EXTENSIONS).map(normalizeExtension),
  databaseFile: env.DATABASE_FILE,
  fileCachePath: env.FILE_CACHE_PATH,

  keywords: parseList(env.KEYWORDS),

  batchSize: parseInt(env.BATCH_SIZE, 10) || 100,

  memory: {
    maxPercent: parseInt(env.MAX_MEMORY_PERCENT, 10) || 80,
    retryIntervalMs: parseInt(env.MEMORY_RETRY_INTERVAL_MS, 10) || 5000,
    maxWaitAttempts: parseInt(env.MEMORY_MAX_WAIT_ATTEMPTS, 10) || 60,
  },

  logLevel: env.LOG_LEVEL,
  logFile: env.LOG_FILE,
};

export default config;
