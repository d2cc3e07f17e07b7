/**
 * Lightcast API Routes - Skills taxonomy proxy
 *
 * - POST /auth            exchange the configured credentials for a token
 * - GET  /skills          search, list types, or count skills per type
 * - GET  /skills/:id      single skill lookup
 */

import { Router } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../middleware/errorHandler.js';
import { DEFAULT_SKILL_LIMIT } from '../../integrations/lightcast/types.js';
import type { TaxonomyGateway } from '../services.js';

// =============================================================================
// SCHEMAS
// =============================================================================

const skillsQuerySchema = z.object({
  action: z.enum(['search', 'types', 'counts']).default('search'),
  q: z.string().trim().optional(),
  typeId: z.string().trim().optional(),
  limit: z.coerce.number().int().positive().default(DEFAULT_SKILL_LIMIT),
});

// =============================================================================
// ROUTES
// =============================================================================

export function createLightcastRoutes(taxonomy: TaxonomyGateway): Router {
  const router = Router();

  /**
   * POST /lightcast/auth - Get a bearer token
   */
  router.post('/auth', async (_req, res, next) => {
    try {
      const token = await taxonomy.getToken();
      res.json({ token });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /lightcast/skills - Search skills, list types or count per type
   */
  router.get('/skills', async (req, res, next) => {
    try {
      const { action, q, typeId, limit } = skillsQuerySchema.parse(req.query);

      if (action === 'types') {
        const result = await taxonomy.listTypes();
        res.json(result);
        return;
      }

      if (action === 'counts') {
        const counts = await taxonomy.countsByType();
        res.json({ counts });
        return;
      }

      const skills = await taxonomy.listSkills({
        query: q || undefined,
        typeId: typeId || undefined,
        limit,
      });
      res.json({ skills });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /lightcast/skills/:id - Get one skill
   */
  router.get('/skills/:id', async (req, res, next) => {
    try {
      const skill = await taxonomy.getSkill(req.params.id);
      if (!skill) {
        throw new NotFoundError('Skill', req.params.id);
      }
      res.json({ skill });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
