/**
 * HTTP server entry point.
 */

import { bootstrap } from './bootstrap.js';
import { loadConfig, loadEnvFile } from './config.js';
import { buildServer } from './server.js';
import { createLogger } from './utils/logger.js';

export async function startServer(port?: number): Promise<void> {
  loadEnvFile();
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  logger.info('Starting warehouse-chat API server...');
  const runtime = await bootstrap(config, logger);

  const app = await buildServer({
    pipeline: runtime.pipeline,
    providers: runtime.providers,
    schemaDescription: runtime.schemaDescription,
    dialect: runtime.dialect,
    maxQuestionLength: config.maxQuestionLength,
    pinnedProvider: config.pinnedProvider,
    logLevel: config.logLevel,
  });

  app.addHook('onClose', async () => {
    logger.info('Shutting down warehouse-chat API server...');
    await runtime.close();
  });

  const shutdown = () => {
    app.close().catch((err: unknown) => {
      logger.error({ err }, 'Error during shutdown');
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  const listenPort = port ?? config.port;
  try {
    await app.listen({ port: listenPort, host: '0.0.0.0' });
  } catch (err) {
    await runtime.close();
    throw err;
  }
  logger.info(`Server running at http://localhost:${listenPort}`);
  logger.info(`API docs at http://localhost:${listenPort}/docs`);
}
