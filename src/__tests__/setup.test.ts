import logger from '../utils/logger';

describe('test setup', () => {
  it('should initialize test environment', () => {
    expect(process.env.NODE_ENV).toBe('test');
  });

  it('should replace the logger with mocks', () => {
    logger.info('hidden');
    expect(jest.isMockFunction(logger.info)).toBe(true);
    expect(logger.info).toHaveBeenCalledWith('hidden');
  });
});
