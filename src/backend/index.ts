/**
 * Standalone entry point: migrate the database, start the server and shut it
 * down cleanly on SIGINT/SIGTERM.
 */

import 'dotenv/config';
import { toError } from './lib/error-utils';
import { runMigrations } from './migrate';
import { createServer } from './server';
import { configService } from './services/config.service';
import { createLogger } from './services/logger.service';

const logger = createLogger('main');

async function main(): Promise<void> {
  runMigrations({
    databasePath: configService.getDatabasePath(),
    migrationsPath: configService.getMigrationsPath(),
    log: (msg) => logger.info(msg),
  });

  const server = createServer();
  await server.start();

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully`);
    server.stop().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Shutdown failed', toError(error));
        process.exit(1);
      }
    );
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection at promise', toError(reason));
});

main().catch((error: unknown) => {
  logger.error('Failed to start server', toError(error));
  process.exit(1);
});
