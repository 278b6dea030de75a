import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import path from 'path';
import { Services } from './container';
import { createApiRoutes } from './api/routes';
import { createWebhookRoutes } from './api/routes/webhook.routes';
import { errorHandler, notFoundHandler } from './api/middleware/error-handler';
import performanceMonitor from './middleware/performance-monitor';

export const createApp = (services: Services): Express => {
  const app = express();

  app.set('trust proxy', true);

  app.use(helmet());
  app.use(cors());
  app.use(compression());
  app.use(performanceMonitor);

  app.get('/health', (req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  // Mounted before express.json so the webhook sees the raw body
  app.use('/webhook', createWebhookRoutes(services));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  app.use('/uploads', express.static(path.resolve(services.config.uploads.dir)));
  app.use('/api/v1', createApiRoutes(services));

  app.all('*', notFoundHandler);
  app.use(errorHandler);

  return app;
};

export default createApp;
