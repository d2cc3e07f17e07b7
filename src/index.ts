/**
 * Skill Rubric Builder - Main Entry Point
 *
 * HTTP API that turns Lightcast taxonomy skills into People Protocol
 * rubrics and recommends skills for roles.
 */

import 'dotenv/config';
import { createApp } from './api/app.js';
import { getCompletionConfig, getServerConfig, isLightcastConfigured } from './infrastructure/config/env.js';

const SHUTDOWN_TIMEOUT_MS = 10000;

// =============================================================================
// STARTUP
// =============================================================================

function start() {
  const { port, nodeEnv } = getServerConfig();
  const completion = getCompletionConfig();

  console.log(`Environment: ${nodeEnv}`);
  console.log(`Completion backend: ${completion.provider}`);
  if (!isLightcastConfigured()) {
    console.warn('LIGHTCAST_CLIENT_ID / LIGHTCAST_CLIENT_SECRET not set; taxonomy calls will fail with 401');
  }

  const app = createApp();

  const server = app.listen(port, () => {
    console.log(`\nSkill Rubric Builder API running on http://localhost:${port}`);
    console.log(`Health check: http://localhost:${port}/health`);
    console.log(`API base: http://localhost:${port}/api\n`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    console.log(`\n${signal} received. Starting graceful shutdown...`);

    server.close((error) => {
      if (error) {
        console.error('Error during shutdown:', error);
        process.exit(1);
      }
      console.log('HTTP server closed');
      process.exit(0);
    });

    // Force exit after timeout
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

// =============================================================================
// RUN
// =============================================================================

try {
  start();
} catch (error) {
  console.error('Failed to start Skill Rubric Builder:', error);
  process.exit(1);
}
