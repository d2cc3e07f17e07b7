/**
 * Lightcast Integration Module
 *
 * Skills taxonomy access over the Lightcast Open Skills API:
 * - Client-credentials authentication, one token per request batch
 * - Skill search, listing by type and lookup by id
 * - Skill type discovery with a sampling fallback, per-type counts
 */

// Types
export type { SkillQuery, SkillTypesResult, SkillCounts } from './types.js';
export { SKILL_FIELDS, DEFAULT_SKILL_LIMIT } from './types.js';

// Errors
export { LightcastError, type LightcastErrorCode } from './errors.js';

// Auth
export { LightcastAuth } from './LightcastAuth.js';

// Client
export {
  LightcastClient,
  LightcastSession,
  getLightcastClient,
  extractTypeList,
} from './LightcastClient.js';
