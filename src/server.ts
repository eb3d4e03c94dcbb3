import { initTracing, shutdownTracing, logger } from './observability';

// Instrumentation must be registered before express and mongoose are loaded
initTracing();

import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { initializeLedger, ledgerRepository } from './services/ledger';

const startServer = async (): Promise<void> => {
  try {
    if (ledgerRepository.kind === 'mongo') {
      await connectDatabase();
    }

    await initializeLedger();
    logger.info(getEnvironmentInfo(), 'Ledger initialized');

    const app = createApp();
    const server = app.listen(config.port, () => {
      logger.info({ port: config.port, env: config.nodeEnv }, 'Server running');
    });

    const shutdown = (signal: string): void => {
      logger.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        logger.info('HTTP server closed');

        Promise.resolve()
          .then(() => (ledgerRepository.kind === 'mongo' ? disconnectDatabase() : undefined))
          .then(() => shutdownTracing())
          .then(() => {
            logger.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            logger.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after 10 seconds
      setTimeout(() => {
        logger.error('Forced shutdown after timeout');
        process.exit(1);
      }, 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    logger.error({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
