/**
 * API Routes
 */

export { default as healthRoutes } from './health.js';
export { default as exportRoutes } from './export.js';
export { createLightcastRoutes } from './lightcast.js';
export { createTransformRoutes } from './transform.js';
export { createRoleRoutes } from './roles.js';
export { createRecommendRoutes } from './recommend.js';
