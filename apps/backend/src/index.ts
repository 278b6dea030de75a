import { createServer } from 'http';
import config from './config';
import logger from './utils/logger';
import { errorMessage } from './utils/errors';
import { closePool } from './db';
import { runMigrations } from './db/migrations';
import { createServices } from './container';
import { createApp } from './app';

const startServer = async () => {
  logger.info('Initializing server...');

  logger.info('Running database migrations...');
  const migrationsSuccess = await runMigrations();
  if (!migrationsSuccess) {
    logger.warn('Database migrations had issues - proceeding with caution');
  }

  const services = createServices(config);
  const app = createApp(services);
  const httpServer = createServer(app);

  httpServer.listen(config.server.port, () => {
    logger.info(`Server running in ${config.server.env} mode on port ${config.server.port}`);
  });

  services.maintenance.start();

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    logger.info(`${signal} received. Shutting down gracefully`);
    services.maintenance.stop();

    httpServer.close(() => {
      closePool()
        .then(() => {
          logger.info('Process terminated');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error(`Failed to close database pool: ${errorMessage(error)}`);
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (err) => {
    logger.error(`Unhandled rejection: ${errorMessage(err)}`);
    httpServer.close(() => {
      process.exit(1);
    });
  });
};

startServer().catch((error: unknown) => {
  logger.error(`Failed to start server: ${errorMessage(error)}`);
  process.exit(1);
});
