/**
 * Transform API Routes - Taxonomy skill to behavioral rubric
 */

import { Router } from 'express';
import { z } from 'zod';
import { skillInputSchema } from '../schemas.js';
import type { AppServices } from '../services.js';

const transformSchema = z.object({
  skill: skillInputSchema,
});

const transformBatchSchema = z.object({
  skills: z.array(skillInputSchema).min(1),
});

export function createTransformRoutes(transformer: AppServices['transformer']): Router {
  const router = Router();

  /**
   * POST /transform - Transform one skill
   */
  router.post('/', async (req, res, next) => {
    try {
      const { skill } = transformSchema.parse(req.body);
      const result = await transformer.transform(skill);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /transform/batch - Transform skills in order, reporting failures per skill
   */
  router.post('/batch', async (req, res, next) => {
    try {
      const { skills } = transformBatchSchema.parse(req.body);
      const outcome = await transformer.transformMany(skills);

      res.json({
        transformed: outcome.succeeded,
        failures: outcome.failures.map((failure) => ({
          skill: { id: failure.item.id, name: failure.item.name },
          error: failure.error,
        })),
        successCount: outcome.successCount,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
