/**
 * Role Generator
 *
 * Asks the completion backend for a realistic role breakdown for a company
 * of a given size.
 */

import type { RoleBreakdown } from '../entities/Recommendation.js';
import type { CompletionClient } from '../../integrations/llm/CompletionClient.js';
import { ConfiguredCompletionClient } from '../../integrations/llm/index.js';
import { ROLE_GENERATION_PROMPT, buildPrompt, withJsonReminder } from '../../integrations/llm/PromptTemplates.js';
import { recoverCompletion, unwrapRecovery } from './ResponseRecovery.js';

const ROLE_OPTIONS = { temperature: 0.7, maxTokens: 2000 };

export function buildRolePrompt(companySize: number): string {
  return withJsonReminder(buildPrompt(ROLE_GENERATION_PROMPT, { company_size: companySize }));
}

export class RoleGenerator {
  constructor(private completion: CompletionClient = new ConfiguredCompletionClient()) {}

  async generate(companySize: number): Promise<RoleBreakdown> {
    if (!Number.isFinite(companySize) || companySize < 1) {
      throw new RangeError('Valid company size (number of employees) is required');
    }

    console.log(`[RoleGenerator] Generating roles for ${companySize} employees via ${this.completion.provider}`);

    const text = await this.completion.complete(buildRolePrompt(companySize), ROLE_OPTIONS);
    const roles = unwrapRecovery(recoverCompletion('roles', text));

    return {
      roles,
      totalPositions: roles.reduce((sum, role) => sum + role.count, 0),
    };
  }
}

let generatorInstance: RoleGenerator | null = null;

export function getRoleGenerator(): RoleGenerator {
  if (!generatorInstance) {
    generatorInstance = new RoleGenerator();
  }
  return generatorInstance;
}
