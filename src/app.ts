import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import Database, { AppDatabase } from './config/database';
import { config } from './config/env';
import { errorHandler, notFound } from './middleware/error.middleware';
import { httpLogger, requestId } from './middleware/logger.middleware';
import { createGeneralRateLimit, createVotingRateLimit } from './middleware/rateLimit.middleware';
import { createApiRouter } from './routes';
import type { Services } from './services';

export interface AppOptions {
  services: Services;
  db: AppDatabase;
  enableRateLimit?: boolean;
  enableRequestLogging?: boolean;
}

export function createApp({
  services,
  db,
  enableRateLimit = true,
  enableRequestLogging = config.nodeEnv !== 'test',
}: AppOptions): Application {
  const app: Application = express();

  // Trust proxy
  app.set('trust proxy', 1);

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          objectSrc: ["'none'"],
          frameSrc: ["'none'"],
        },
      },
    })
  );

  // CORS configuration
  app.use(
    cors({
      origin: config.corsOrigin === '*' ? true : config.corsOrigin.split(',').map((origin) => origin.trim()),
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Origin', 'X-Requested-With', 'Content-Type', 'Accept', 'X-Request-Id'],
    })
  );

  // Body parsing middleware
  app.use(express.json({ limit: '100kb' }));

  // Compression middleware
  app.use(compression());

  // Logging middleware
  app.use(requestId);
  if (enableRequestLogging) {
    app.use(httpLogger);
  }

  // Rate limiting
  if (enableRateLimit) {
    app.use('/api/', createGeneralRateLimit());
  }

  // Health check endpoint
  app.get('/health', (req: Request, res: Response) => {
    const healthy = Database.healthCheck(db);

    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'OK' : 'ERROR',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      services: {
        database: healthy ? 'connected' : 'unavailable',
      },
    });
  });

  // API routes
  app.use(
    '/api',
    createApiRouter(services, { votingRateLimit: enableRateLimit ? createVotingRateLimit() : undefined })
  );

  // Unmatched routes
  app.use(notFound);

  // Global error handling middleware
  app.use(errorHandler);

  return app;
}

export default createApp;
