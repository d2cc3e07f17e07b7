/**
 * Role Generation Route
 */

import { Router } from 'express';
import { z } from 'zod';
import type { AppServices } from '../services.js';

const generateRolesSchema = z.object({
  companySize: z.number().finite().min(1),
});

export function createRoleRoutes(roleGenerator: AppServices['roleGenerator']): Router {
  const router = Router();

  /**
   * POST /generate-roles - Role breakdown for a company size
   */
  router.post('/', async (req, res, next) => {
    try {
      const { companySize } = generateRolesSchema.parse(req.body);
      const breakdown = await roleGenerator.generate(companySize);
      res.json(breakdown);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
