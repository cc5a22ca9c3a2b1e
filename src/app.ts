import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { config } from './config';
import { Custody } from './custody';
import { errorHandler, notFoundHandler } from './middlewares/errorHandler';
import { globalLimiter } from './middlewares/rateLimiter';
import { createHealthRoutes } from './routes/health';
import { createAuthRoutes } from './auth';
import { CampaignController, createCampaignRoutes } from './services/campaign';
import { ProviderController, createProviderRoutes } from './services/provider';
import { TransferController, createTransferRoutes } from './services/transfer';
import { RailController, createRailRoutes } from './services/rail';
import {
  correlationMiddleware,
  metricsMiddleware,
  getMetrics,
  getMetricsContentType,
  logger,
} from './observability';

export const createApp = (custody: Custody): Application => {
  const app = express();

  // Security middleware
  app.use(
    helmet({
      contentSecurityPolicy: config.security.contentSecurityPolicy,
      hsts: config.security.hsts,
    })
  );
  app.use(cors({ origin: config.api.corsOrigins }));

  // Request parsing
  app.use(express.json({ limit: config.api.bodyLimit }));

  // Observability middleware (applied early to capture all requests)
  app.use(correlationMiddleware);
  app.use(metricsMiddleware);
  app.use(globalLimiter);

  // Routes
  app.use('/health', createHealthRoutes(custody));
  app.use('/auth', createAuthRoutes());
  app.use('/campaigns', createCampaignRoutes(new CampaignController(custody.coordinator, custody.queries)));
  app.use('/providers', createProviderRoutes(new ProviderController(custody.coordinator, custody.queries)));
  app.use('/transfers', createTransferRoutes(new TransferController(custody.queries)));
  app.use('/rail', createRailRoutes(new RailController(custody.simulatedRail)));

  // Metrics endpoint (Prometheus format)
  app.get('/metrics', async (_req, res) => {
    try {
      res.set('Content-Type', getMetricsContentType());
      res.send(await getMetrics());
    } catch (error) {
      logger.error({ err: error }, 'Error collecting metrics');
      res.status(500).send('Error collecting metrics');
    }
  });

  // Root route
  app.get('/', (_req, res) => {
    res.json({
      name: 'Campaign Custody API',
      version: '1.0.0',
      description: 'Custody and transfer coordination for campaign budgets and provider earnings',
    });
  });

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
