import { afterEach } from 'vitest';
import { logger } from './src/logger.js';

process.env.NODE_ENV = 'test';

// Keep pipeline chatter out of test output; suites that assert on logging
// build their own Logger.
logger.setMinLevel('error');

afterEach(() => {
  logger.clear();
  logger.setMinLevel('error');
});
