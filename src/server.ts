import { createApp } from './app';
import { config, getEnvironmentInfo } from './config';
import { connectDatabase, disconnectDatabase } from './config/database';
import { connectRedis, disconnectRedis } from './config/redis';
import { createCustody } from './custody';
import { createServiceLogger } from './observability/logger';

const log = createServiceLogger('server');

const startServer = async (): Promise<void> => {
  try {
    if (config.persistence === 'mongo') {
      await connectDatabase();
    }

    try {
      await connectRedis();
    } catch (error) {
      // Rate limits and idempotent replay degrade; transfers keep working
      log.warn({ err: error }, 'Redis unavailable, continuing without it');
    }

    const custody = createCustody();
    await custody.start();

    const app = createApp(custody);

    // Start HTTP server
    const server = app.listen(config.port, () => {
      log.info({ port: config.port, ...getEnvironmentInfo() }, 'Server running');
    });

    // Graceful shutdown: in-flight transfers finish before the last snapshot is written
    const shutdown = (signal: string): void => {
      log.info({ signal }, 'Starting graceful shutdown');

      server.close(() => {
        log.info('HTTP server closed');

        custody
          .stop()
          .then(() => disconnectRedis())
          .then(() => disconnectDatabase())
          .then(() => {
            log.info('Graceful shutdown completed');
            process.exit(0);
          })
          .catch((error: unknown) => {
            log.error({ err: error }, 'Error during shutdown');
            process.exit(1);
          });
      });

      // Force exit after the rail timeout plus a margin
      setTimeout(() => {
        log.error('Forced shutdown after timeout');
        process.exit(1);
      }, config.rail.timeoutMs + 10000).unref();
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

void startServer();
