/**
 * Health Check Routes
 */

import { Router } from 'express';
import {
  getCompletionConfig,
  isLightcastConfigured,
} from '../../infrastructure/config/env.js';

const router = Router();

/**
 * Basic health check
 */
router.get('/', (_req, res) => {
  res.json({
    status: 'ok',
    timestamp: new Date().toISOString(),
    service: 'skill-rubric-builder',
  });
});

/**
 * Readiness: are the taxonomy credentials and completion backend configured
 */
router.get('/ready', (_req, res) => {
  const checks: Record<string, { status: 'configured' | 'missing'; provider?: string }> = {};

  checks.taxonomy = { status: isLightcastConfigured() ? 'configured' : 'missing' };

  const completion = getCompletionConfig();
  checks.completion = {
    status: completion.provider === 'anthropic' && !completion.anthropic.apiKey ? 'missing' : 'configured',
    provider: completion.provider,
  };

  const ready = Object.values(checks).every((c) => c.status === 'configured');

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ready' : 'degraded',
    timestamp: new Date().toISOString(),
    checks,
  });
});

export default router;
