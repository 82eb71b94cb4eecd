/**
 * Standalone entry point
 *
 * Starts the HTTP API and the notification scheduler in one process.
 *
 * **Usage:**
 * - Development (with hot-reload): `npm run dev`
 * - Production: `npm run build && npm start`
 *
 * Configuration is read from the environment, see `.env.example`.
 * SIGINT and SIGTERM stop the scheduler (letting the in-flight tick finish),
 * close the HTTP server and the database, then exit.
 */

import { createApplication } from './app';
import { loadConfig } from './shared/config/env';
import { logger } from './shared/logger';
import { startServer } from './adapters/primary/http/server';
import { errorFields } from './shared/utils/errors';

async function main(): Promise<void> {
  const config = loadConfig();
  const app = createApplication(config);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ msg: 'Gracefully shutting down...', signal });

    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      logger.error({ msg: 'Shutdown failed', ...errorFields(error) });
      process.exit(1);
    }
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });
  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await startServer(app.server, config.port, config.host);
  app.scheduler.start();
}

main().catch((error: unknown) => {
  logger.fatal({ msg: 'Failed to start', ...errorFields(error) });
  process.exit(1);
});
