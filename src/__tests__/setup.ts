/**
 * Jest Test Setup
 * Sets up environment variables and mocks for testing
 */

import * as os from 'os';
import * as path from 'path';

// Set required environment variables for tests
process.env.NODE_ENV = 'test';
process.env.MAX_MEMORY_PERCENT = '100';
process.env.FILE_CACHE_PATH = path.join(os.tmpdir(), 'mailbox-threads-test', 'processed_files.json');
process.env.KEYWORDS = 'urgent,legal,contract';
process.env.DATABASE_FILE = ':memory:';
process.env.LOG_LEVEL = 'error';

// Mock logger to suppress logs during tests
jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
  setLogLevel: jest.fn(),
}));

// Clean up mocks after each test
// resetAllMocks() clears mock history AND resets implementations
afterEach(() => {
  jest.resetAllMocks();
});
