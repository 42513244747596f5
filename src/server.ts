import { createApp } from './app';
import Database from './config/database';
import { config } from './config/env';
import { ElGamalCryptoEngine } from './crypto/elgamal-engine';
import { JobScheduler } from './jobs';
import { createServices } from './services';
import { logger } from './utils/logger';

const SHUTDOWN_TIMEOUT_MS = 30000;

function bootstrap(): void {
  const { db } = Database.getInstance();

  const services = createServices({
    db,
    engine: new ElGamalCryptoEngine(),
    crypto: {
      timeoutMs: config.crypto.timeoutMs,
      retryBackoffMs: config.crypto.retryBackoffMs,
    },
  });

  const app = createApp({ services, db });
  const scheduler = new JobScheduler(services.events, services.results);
  scheduler.initialize(config.tallyRefreshCron);

  const server = app.listen(config.port, () => {
    logger.info(`Server listening on port ${config.port} (${config.nodeEnv})`);
  });

  let shuttingDown = false;

  const gracefulShutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    scheduler.stop();

    // Force shutdown if connections do not drain
    const forceExit = setTimeout(() => {
      logger.error('Could not close connections in time, forcefully shutting down');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    server.close((error) => {
      if (error) {
        logger.error('Error while closing HTTP server:', error);
      } else {
        logger.info('HTTP server closed');
      }

      Database.disconnect();
      process.exit(error ? 1 : 0);
    });
  };

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

try {
  bootstrap();
} catch (error) {
  logger.error('Failed to start server', error);
  process.exit(1);
}
