import express, { Application } from 'express';
import cors from 'cors';
import { corsOrigins } from './config/env';
import { requestLogger } from './middleware/requestLogger';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import apiRoutes from './routes';

export function createApp(): Application {
  const app = express();

  app.use(cors({ origin: corsOrigins() }));
  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));
  app.use(requestLogger);

  app.use('/api', apiRoutes);

  app.get('/', (_req, res) => {
    res.json({
      message: 'InventoryWise API is LIVE!',
      timestamp: new Date().toISOString(),
      status: 'Server Running',
      version: '1.0.0'
    });
  });

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
