/**
 * Lightcast API Types
 *
 * Only the fields this service reads are modelled. Payloads are validated
 * with zod on the way in, anything else in them is ignored.
 */

import { z } from 'zod';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface SkillQuery {
  query?: string;
  typeId?: string;
  limit?: number;
}

/** Field list requested for every skill listing */
export const SKILL_FIELDS = 'id,name,type,description,infoUrl';

export const DEFAULT_SKILL_LIMIT = 50;

/** Sample size used to derive skill types when the versions payload has none */
export const TYPE_SAMPLE_SIZE = 1000;

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
});

export const skillTypeSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
});

/**
 * A skill as returned by the API. Lightcast sends `null` for missing
 * descriptions; those become absent fields.
 */
export const apiSkillSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  type: skillTypeSchema.nullish(),
  description: z.string().nullish(),
  infoUrl: z.string().nullish(),
});

export type ApiSkill = z.infer<typeof apiSkillSchema>;

export const skillListResponseSchema = z.object({
  data: z.array(z.unknown()).nullish(),
  meta: z
    .object({
      total: z.number().nullish(),
    })
    .passthrough()
    .nullish(),
});

export const skillDetailResponseSchema = z.object({
  data: z.unknown(),
});

// =============================================================================
// RESULTS
// =============================================================================

export interface SkillTypesResult {
  types: Array<{ id: string; name: string }>;
  /** Raw versions payload, only present when no types could be found */
  debug?: unknown;
}

export type SkillCounts = Record<string, number>;
