/**
 * Domain Services Module
 *
 * - Response recovery: JSON extraction and validation of completion text
 * - Similarity: near-duplicate skill names
 * - Transformer: taxonomy skill to five-level rubric
 * - Role generator: role breakdown for a company size
 * - Recommender: six diverse skills for a role
 * - Export: People Protocol envelope
 */

export * from './ResponseRecovery.js';
export * from './SkillSimilarity.js';

export {
  SkillTransformer,
  getSkillTransformer,
  buildTransformPrompt,
  checkLevelCardinality,
  type TransformResult,
} from './SkillTransformer.js';

export { RoleGenerator, getRoleGenerator, buildRolePrompt } from './RoleGenerator.js';

export {
  SkillRecommender,
  getSkillRecommender,
  searchRecommendedSkills,
  broaderSearchTerms,
  buildConversationContext,
  buildRecommendationPrompt,
  roleTranscript,
  RECOMMENDED_SKILL_COUNT,
  type RecommendationRequest,
  type SkillSearchProvider,
  type SkillSearchSession,
} from './SkillRecommender.js';

export { EXPORT_FILENAME, buildExportDocument, serializeExportDocument } from './ExportService.js';
