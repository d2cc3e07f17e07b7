/**
 * Skill Transformer
 *
 * Turns a taxonomy skill into a five-level behavioral rubric with one
 * completion call. Statement counts per level are checked against the
 * ranges the prompt asks for and reported as warnings only.
 */

import {
  LEVEL_STATEMENT_RANGES,
  PROFICIENCY_LEVELS,
  type SkillRecord,
  type TransformedSkill,
} from '../entities/Skill.js';
import type { BatchOutcome } from '../entities/Recommendation.js';
import type { CompletionClient } from '../../integrations/llm/CompletionClient.js';
import { ConfiguredCompletionClient } from '../../integrations/llm/index.js';
import { TRANSFORMATION_PROMPT, buildPrompt, withJsonReminder } from '../../integrations/llm/PromptTemplates.js';
import { recoverCompletion, unwrapRecovery } from './ResponseRecovery.js';

// =============================================================================
// TYPES
// =============================================================================

export interface TransformResult {
  transformed: TransformedSkill;
  /** Levels whose statement count is outside the advised range */
  warnings: string[];
}

const TRANSFORM_OPTIONS = { temperature: 0.7, maxTokens: 2000 };

const MISSING_DESCRIPTION = 'No description available';

// =============================================================================
// HELPERS
// =============================================================================

export function buildTransformPrompt(skill: SkillRecord): string {
  return withJsonReminder(
    buildPrompt(TRANSFORMATION_PROMPT, {
      skill_name: skill.name,
      skill_description: skill.description || MISSING_DESCRIPTION,
      skill_id: skill.id,
    })
  );
}

export function checkLevelCardinality(skill: TransformedSkill): string[] {
  const warnings: string[] = [];
  for (const level of PROFICIENCY_LEVELS) {
    const count = skill.levels[level].length;
    const { min, max } = LEVEL_STATEMENT_RANGES[level];
    if (count < min || count > max) {
      warnings.push(`Level "${level}" has ${count} statement(s), expected ${min}-${max}`);
    }
  }
  return warnings;
}

// =============================================================================
// SKILL TRANSFORMER
// =============================================================================

export class SkillTransformer {
  constructor(private completion: CompletionClient = new ConfiguredCompletionClient()) {}

  async transform(skill: SkillRecord): Promise<TransformResult> {
    console.log(`[SkillTransformer] Transforming "${skill.name}" (${skill.id}) via ${this.completion.provider}`);

    const text = await this.completion.complete(buildTransformPrompt(skill), TRANSFORM_OPTIONS);
    const transformed = unwrapRecovery(recoverCompletion('transform', text));
    const warnings = checkLevelCardinality(transformed);

    if (warnings.length > 0) {
      console.warn(`[SkillTransformer] "${skill.name}": ${warnings.join('; ')}`);
    }

    return { transformed, warnings };
  }

  /**
   * Transform skills one after another. A failed skill is recorded and
   * the rest still run.
   */
  async transformMany(skills: SkillRecord[]): Promise<BatchOutcome<SkillRecord, TransformResult>> {
    const succeeded: TransformResult[] = [];
    const failures: BatchOutcome<SkillRecord, TransformResult>['failures'] = [];

    for (const skill of skills) {
      try {
        succeeded.push(await this.transform(skill));
      } catch (error) {
        const message = error instanceof Error ? error.message : `Failed to transform ${skill.name}`;
        console.error(`[SkillTransformer] Transform error for ${skill.name}:`, message);
        failures.push({ item: skill, error: message });
      }
    }

    console.log(`[SkillTransformer] Transformed ${succeeded.length}/${skills.length} skill(s)`);
    return { succeeded, failures, successCount: succeeded.length };
  }
}

// =============================================================================
// SINGLETON
// =============================================================================

let transformerInstance: SkillTransformer | null = null;

export function getSkillTransformer(): SkillTransformer {
  if (!transformerInstance) {
    transformerInstance = new SkillTransformer();
  }
  return transformerInstance;
}
