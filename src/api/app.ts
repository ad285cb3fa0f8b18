// API layer: Express app configuration
// Composes all middleware and routes

import express, { type Application, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler.js';
import { createCatalogRouter } from './routes/catalog.js';
import { createSessionRouter } from './routes/sessions/index.js';
import type { ISessionRegistry } from '@/infrastructure/session/SessionRegistry.js';
import { gameMetrics } from '@/utils/metrics.js';

export interface AppConfig {
  registry: ISessionRegistry;
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string;
  defaultDifficulty: string;
}

export function createApp(config: Pick<AppConfig, 'registry'> & Partial<AppConfig>): Application {
  const app = express();

  const {
    registry,
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
    defaultDifficulty = 'normal',
  } = config;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  // CORS
  app.use(cors({
    origin: corsOrigins,
  }));

  // Logging
  app.use(morgan(logFormat, {
    skip: () => process.env.NODE_ENV === 'test',
  }));

  // Body parsing
  app.use(express.json({ limit: '100kb' }));

  // Health check (before routes)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      sessions: registry.size,
    });
  });

  app.get('/api/metrics', (_req: Request, res: Response) => {
    res.json({ success: true, metrics: gameMetrics.snapshot() });
  });

  // API routes
  app.use('/api', createCatalogRouter());
  app.use('/api/sessions', createSessionRouter(registry, defaultDifficulty));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
