/**
 * Skill - Taxonomy records and the rubric built from them
 *
 * A SkillRecord is what the Lightcast taxonomy returns. A TransformedSkill
 * is the five-level behavioral rubric generated for one record.
 */

// =============================================================================
// TAXONOMY RECORDS
// =============================================================================

export interface SkillType {
  id: string;
  name: string;
}

export interface SkillRecord {
  /** Opaque taxonomy key, unique per skill */
  id: string;
  name: string;
  type?: SkillType;
  description?: string;
  infoUrl?: string;
}

// =============================================================================
// RUBRIC
// =============================================================================

export const PROFICIENCY_LEVELS = ['poor', 'basic', 'intermediate', 'advanced', 'exceptional'] as const;

export type ProficiencyLevel = (typeof PROFICIENCY_LEVELS)[number];

export type RubricLevels = Record<ProficiencyLevel, string[]>;

export interface TransformedSkill {
  name: string;
  description: string;
  lightcast_id: string;
  levels: RubricLevels;
}

/**
 * Statement counts the transform prompt asks for. Reported, not enforced.
 */
export const LEVEL_STATEMENT_RANGES: Record<ProficiencyLevel, { min: number; max: number }> = {
  poor: { min: 2, max: 5 },
  basic: { min: 2, max: 4 },
  intermediate: { min: 2, max: 4 },
  advanced: { min: 3, max: 5 },
  exceptional: { min: 1, max: 3 },
};

// =============================================================================
// EXPORT
// =============================================================================

export const EXPORT_FRAMEWORK = 'People Protocol';
export const EXPORT_VERSION = '1.0';

export interface ExportDocument {
  framework: typeof EXPORT_FRAMEWORK;
  version: typeof EXPORT_VERSION;
  skills: TransformedSkill[];
}
