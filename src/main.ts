/**
 * `npm start` / `npm run dev` entry.
 */

import { startServer } from './index.js';
import { logger } from './utils/logger.js';

startServer().catch((err: unknown) => {
  logger.error({ err }, 'Failed to start server');
  process.exitCode = 1;
});
