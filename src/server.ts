import { env } from './config/env';
import { logger } from './config/logger';
import connectDB, { disconnectDB } from './config/database';
import { createApp } from './app';
import { startStockReportJob } from './jobs/stockReportJob';

async function startServer(): Promise<void> {
  await connectDB();

  const app = createApp();
  const reportJob = startStockReportJob();

  const server = app.listen(env.PORT, () => {
    logger.info(`Server is running on http://localhost:${env.PORT}`, { env: env.NODE_ENV });
  });

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    reportJob?.stop();

    server.close(() => {
      disconnectDB()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error while closing MongoDB connection', { error });
          process.exit(1);
        });
    });

    // Force exit if connections do not drain
    setTimeout(() => process.exit(1), 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

startServer().catch((error: unknown) => {
  logger.error('Failed to start server', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
