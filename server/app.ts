/**
 * Express application
 * Route table and middleware order; services are passed in so tests can build an app without I/O
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { errorMessage } from '../content-engine/utils/errors.js';
import { GenerationHandlers } from './api/generation.js';
import { HealthEndpoints } from './monitoring/health-endpoints.js';
import { SecurityMiddleware } from './security/middleware.js';

export interface AppOptions {
  handlers: GenerationHandlers;
  health: HealthEndpoints;
  security: SecurityMiddleware;
  corsOrigin: string;
  onError: (message: string, data: Record<string, unknown>) => void;
}

export function createApp(options: AppOptions): Express {
  const { handlers, health, security } = options;
  const app = express();

  // Security middleware (applied globally)
  app.use(security.securityMiddleware());
  app.use(security.createRateLimit());

  // CORS and body parsing
  app.use(cors({ origin: options.corsOrigin }));
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true }));

  // Generation routes
  const generationLimit = security.createGenerationRateLimit();
  app.post('/api/teaching-plans', generationLimit, handlers.startTeachingPlan);
  app.post('/api/lesson-plans', generationLimit, handlers.startLessonPlan);
  app.post('/api/copyright/projects/:projectId/generate', generationLimit, handlers.startCopyright);
  app.get('/api/copyright/projects/:projectId/download', handlers.downloadArchive);
  app.post('/api/courses/:courseId/teaching-plans/import', generationLimit, handlers.importPlan);

  // Job routes
  app.get('/api/jobs/:jobId', handlers.getJob);
  app.get('/api/projects/:projectId/jobs/latest', handlers.getLatestJob);

  app.post('/api/chat', generationLimit, handlers.chat);

  // Health endpoints
  app.get('/health', health.health);
  app.get('/live', health.live);

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Endpoint not found'
    });
  });

  // Error handling
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    options.onError('Server error', { path: req.path, error: errorMessage(err) });
    res.status(500).json({
      success: false,
      error: 'Internal server error'
    });
  });

  return app;
}
