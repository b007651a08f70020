import 'reflect-metadata';
import { createServer } from 'http';
import { loadConfig } from './config/env';
import { configureLogger, logger } from './config/logger';
import { closeDatabase, createDataSource, initializeDatabase } from './config/database';
import { createServices } from './bootstrap';
import { createApp } from './app';

// Start server
const startServer = async (): Promise<void> => {
  const config = loadConfig();
  configureLogger(config);

  const dataSource = createDataSource(config);
  await initializeDatabase(dataSource);

  const services = createServices(config, dataSource);
  const app = createApp({ config, dataSource, ...services });
  const server = createServer(app);

  server.listen(config.api.port, config.api.host, () => {
    logger.info(`🚀 Social metrics backend running on ${config.api.host}:${config.api.port}`);
    logger.info(`🌍 Environment: ${config.api.nodeEnv}`);
    logger.info(`🔗 CORS origins: ${config.api.allowedOrigins.join(', ')}`);
    logger.info(`📒 Content backend: ${services.contentStore.backend}`);
    logger.info(`📋 Available endpoints:`);
    logger.info(`   GET  /api/health`);
    logger.info(`   GET  /api/dashboard/stats`);
    logger.info(`   GET  /api/dashboard/top-posts?platform=All&sortBy=views`);
    logger.info(`   POST /api/dashboard/refresh`);
    logger.info(`   GET  /api/content/pipeline`);
    logger.info(`   GET  /api/content/calendar?hasDraft=false`);
    logger.info(`   POST /api/content/calendar/generate`);
  });

  // Graceful shutdown
  const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.info(`🔄 Received ${signal}. Starting graceful shutdown...`);

    try {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      logger.info('📴 HTTP server closed');

      await closeDatabase(dataSource);

      logger.info('✅ Graceful shutdown completed');
      process.exit(0);
    } catch (error) {
      logger.error('❌ Error during graceful shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
};

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason) => {
  logger.error('❌ Unhandled Rejection:', reason);
});

startServer().catch((error: unknown) => {
  logger.error('❌ Failed to start server:', error);
  process.exit(1);
});
