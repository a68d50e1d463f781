/**
 * Circle Routes: polygon approximations of circles on the sphere and plane.
 */

import { Router } from 'express';
import type { AppConfig } from '../config.js';
import { createCircleController } from '../controllers/circleController.js';
import { validate } from '../middleware/errorHandler.js';
import { computeLimiter, publicReadLimiter } from '../middleware/rateLimiter.js';
import { computeCirclesBodySchema, computeFlatCirclesBodySchema, referenceQuerySchema } from '../types/index.js';

export function createCircleRoutes(config: AppConfig): Router {
  const router = Router();
  const controller = createCircleController(config);

  // Spherical circles for posted locations
  router.post('/', computeLimiter, validate(computeCirclesBodySchema), controller.computeSphericalCircles);

  // Flat-plane circles for posted locations
  router.post('/flat', computeLimiter, validate(computeFlatCirclesBodySchema), controller.computePlaneCircles);

  // Bundled reference locations
  router.get('/reference', publicReadLimiter, validate(referenceQuerySchema, 'query'), controller.getReferenceCircles);

  return router;
}
