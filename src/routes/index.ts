import { Router } from 'express';
import type { AppConfig } from '../config.js';
import { createCircleRoutes } from './circleRoutes.js';
import { notFound } from '../middleware/errorHandler.js';

export function createRoutes(config: AppConfig): Router {
  const router = Router();

  // Health check (public)
  router.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.use('/api/circles', createCircleRoutes(config));

  // Unknown API routes
  router.use('/api', (_req, _res, next) => {
    next(notFound('Endpoint not found'));
  });

  return router;
}
