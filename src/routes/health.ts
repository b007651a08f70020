import { Router, Request, Response } from 'express';
import { DataSource } from 'typeorm';
import { checkDatabaseHealth } from '../config/database';
import { logger } from '../config/logger';

export function createHealthRoutes(dataSource: DataSource, nodeEnv: string): Router {
  const router = Router();

  // Basic health check
  router.get('/', async (req: Request, res: Response) => {
    try {
      const databaseHealthy = await checkDatabaseHealth(dataSource);
      const health = {
        status: databaseHealthy ? 'healthy' : 'degraded',
        database: databaseHealthy ? 'connected' : 'unavailable',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        environment: nodeEnv,
      };

      res.status(databaseHealthy ? 200 : 503).json({
        success: databaseHealthy,
        data: health,
        timestamp: health.timestamp,
      });
    } catch (error) {
      logger.error('Health check failed:', error);
      res.status(500).json({
        success: false,
        error: 'Health check failed',
        timestamp: new Date().toISOString(),
      });
    }
  });

  return router;
}
