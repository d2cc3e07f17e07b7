/**
 * Services the HTTP routes depend on. Defaults are the process-wide
 * singletons; tests pass in-process fakes.
 */

import type { LightcastClient } from '../integrations/lightcast/LightcastClient.js';
import { getLightcastClient } from '../integrations/lightcast/LightcastClient.js';
import type { SkillTransformer } from '../domain/services/SkillTransformer.js';
import { getSkillTransformer } from '../domain/services/SkillTransformer.js';
import type { RoleGenerator } from '../domain/services/RoleGenerator.js';
import { getRoleGenerator } from '../domain/services/RoleGenerator.js';
import type { SkillRecommender } from '../domain/services/SkillRecommender.js';
import { getSkillRecommender } from '../domain/services/SkillRecommender.js';

export type TaxonomyGateway = Pick<
  LightcastClient,
  'getToken' | 'listSkills' | 'getSkill' | 'listTypes' | 'countsByType'
>;

export interface AppServices {
  taxonomy: TaxonomyGateway;
  transformer: Pick<SkillTransformer, 'transform' | 'transformMany'>;
  roleGenerator: Pick<RoleGenerator, 'generate'>;
  recommender: Pick<SkillRecommender, 'recommend' | 'recommendForRoles'>;
}

export function resolveServices(overrides: Partial<AppServices> = {}): AppServices {
  return {
    taxonomy: overrides.taxonomy ?? getLightcastClient(),
    transformer: overrides.transformer ?? getSkillTransformer(),
    roleGenerator: overrides.roleGenerator ?? getRoleGenerator(),
    recommender: overrides.recommender ?? getSkillRecommender(),
  };
}
