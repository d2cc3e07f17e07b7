/**
 * Recommendation API Routes
 *
 * Stateless: the client sends the whole transcript with every call and a
 * follow-up response returns the extended transcript.
 */

import { Router } from 'express';
import { z } from 'zod';
import { conversationTurnSchema, roleSpecSchema } from '../schemas.js';
import type { AppServices } from '../services.js';

const recommendSchema = z.object({
  roleTitle: z.string().trim().min(1),
  conversationHistory: z.array(conversationTurnSchema).default([]),
  answer: z.string().optional(),
});

const recommendBatchSchema = z.object({
  roles: z.array(roleSpecSchema).min(1),
});

export function createRecommendRoutes(recommender: AppServices['recommender']): Router {
  const router = Router();

  /**
   * POST /recommend - Follow-up question or six skills for a role
   */
  router.post('/', async (req, res, next) => {
    try {
      const input = recommendSchema.parse(req.body);
      const result = await recommender.recommend(input);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /recommend/batch - Skills for every role, no follow-up questions
   */
  router.post('/batch', async (req, res, next) => {
    try {
      const { roles } = recommendBatchSchema.parse(req.body);
      const outcome = await recommender.recommendForRoles(roles);

      res.json({
        results: outcome.succeeded,
        failures: outcome.failures.map((failure) => ({ role: failure.item, error: failure.error })),
        successCount: outcome.successCount,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
