/**
 * Export Route - People Protocol document download
 */

import { Router } from 'express';
import { z } from 'zod';
import { transformedSkillSchema } from '../../domain/services/ResponseRecovery.js';
import {
  EXPORT_FILENAME,
  buildExportDocument,
  serializeExportDocument,
} from '../../domain/services/ExportService.js';

const exportSchema = z.object({
  skills: z.array(transformedSkillSchema),
});

const router = Router();

/**
 * POST /export - Wrap transformed skills in the export envelope
 */
router.post('/', (req, res, next) => {
  try {
    const { skills } = exportSchema.parse(req.body);
    const document = buildExportDocument(skills);

    res.attachment(EXPORT_FILENAME).send(serializeExportDocument(document));
  } catch (error) {
    next(error);
  }
});

export default router;
