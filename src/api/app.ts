/**
 * Express Application - Skill Rubric Builder API
 */

import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { v4 as uuid } from 'uuid';

import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import {
  healthRoutes,
  exportRoutes,
  createLightcastRoutes,
  createTransformRoutes,
  createRoleRoutes,
  createRecommendRoutes,
} from './routes/index.js';
import { resolveServices, type AppServices } from './services.js';
import { getServerConfig } from '../infrastructure/config/env.js';

// =============================================================================
// CREATE APP
// =============================================================================

export function createApp(overrides: Partial<AppServices> = {}) {
  const app = express();
  const services = resolveServices(overrides);
  const { corsOrigin } = getServerConfig();

  // ===========================================================================
  // GLOBAL MIDDLEWARE
  // ===========================================================================

  // Security headers
  app.use(helmet());

  app.use(
    cors({
      origin: corsOrigin,
      methods: ['GET', 'POST', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-Id'],
      exposedHeaders: ['Content-Disposition', 'X-Request-Id'],
    })
  );

  // Rubric batches can be large
  app.use(express.json({ limit: '10mb' }));

  // Request ID
  app.use((req, res, next) => {
    const incoming = req.headers['x-request-id'];
    const requestId = typeof incoming === 'string' && incoming ? incoming : uuid();
    req.headers['x-request-id'] = requestId;
    res.setHeader('X-Request-Id', requestId);
    next();
  });

  // ===========================================================================
  // ROUTES
  // ===========================================================================

  app.use('/health', healthRoutes);

  app.use('/api/lightcast', createLightcastRoutes(services.taxonomy));
  app.use('/api/transform', createTransformRoutes(services.transformer));
  app.use('/api/generate-roles', createRoleRoutes(services.roleGenerator));
  app.use('/api/recommend', createRecommendRoutes(services.recommender));
  app.use('/api/export', exportRoutes);

  // ===========================================================================
  // ERROR HANDLING
  // ===========================================================================

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export default createApp;
