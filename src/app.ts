import express, { Application, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { DataSource } from 'typeorm';
import type { AppConfig } from './config/env';
import { createHealthRoutes } from './routes/health';
import { createDashboardRoutes } from './routes/dashboard';
import { createContentRoutes } from './routes/content';
import { MetricsStoreService } from './services/MetricsStoreService';
import { RefreshService } from './services/RefreshService';
import { DraftWorkflowService } from './services/DraftWorkflowService';
import { InspirationService } from './services/InspirationService';
import { ContentStore } from './services/content';
import { sendError } from './utils/http';

export interface AppDependencies {
  config: AppConfig;
  dataSource: DataSource;
  metrics: MetricsStoreService;
  contentStore: ContentStore;
  refresh: RefreshService;
  drafts: DraftWorkflowService;
  inspiration: InspirationService;
}

export function createApp(deps: AppDependencies): Application {
  const { config } = deps;
  const app = express();

  // Global middleware
  if (config.api.nodeEnv === 'development') {
    app.use(
      helmet({
        crossOriginResourcePolicy: false,
        contentSecurityPolicy: false,
      })
    );
  } else {
    app.use(helmet());
  }
  app.use(compression());

  const corsOptions = {
    origin: (origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) => {
      // Allow requests with no origin (curl, server-to-server)
      if (!origin) return callback(null, true);

      if (config.api.allowedOrigins.includes(origin)) {
        return callback(null, true);
      }

      callback(new Error('Not allowed by CORS'), false);
    },
    credentials: true,
    methods: ['GET', 'POST', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With'],
    optionsSuccessStatus: 200,
  };
  app.use(cors(corsOptions));

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true }));

  // API Routes
  app.use('/api/health', createHealthRoutes(deps.dataSource, config.api.nodeEnv));
  app.use('/api/dashboard', createDashboardRoutes({ metrics: deps.metrics, refresh: deps.refresh }));
  app.use(
    '/api/content',
    createContentRoutes({
      contentStore: deps.contentStore,
      drafts: deps.drafts,
      inspiration: deps.inspiration,
    })
  );

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
    });
  });

  // Malformed JSON bodies and CORS rejections land here
  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ success: false, error: 'Malformed JSON body', timestamp: new Date().toISOString() });
      return;
    }
    if (error instanceof Error && error.message === 'Not allowed by CORS') {
      res.status(403).json({ success: false, error: error.message, timestamp: new Date().toISOString() });
      return;
    }
    sendError(res, error, 'Unexpected server error');
  });

  return app;
}
