/**
 * Skill Recommender
 *
 * Recommends six diverse taxonomy skills for a role. The completion backend
 * either asks one follow-up question or names six skill keywords; keywords
 * are then resolved against the taxonomy and near-duplicates filtered out.
 *
 * The recommender keeps no conversation state. Each call takes the whole
 * transcript and a follow-up result hands back the extended transcript.
 */

import type { SkillRecord } from '../entities/Skill.js';
import type {
  BatchOutcome,
  ConversationTurn,
  RecommendationResult,
  RoleSkillSet,
  RoleSpec,
} from '../entities/Recommendation.js';
import type { CompletionClient } from '../../integrations/llm/CompletionClient.js';
import { ConfiguredCompletionClient } from '../../integrations/llm/index.js';
import { RECOMMENDATION_PROMPT, buildPrompt, withJsonReminder } from '../../integrations/llm/PromptTemplates.js';
import { getLightcastClient } from '../../integrations/lightcast/LightcastClient.js';
import { recoverCompletion, unwrapRecovery } from './ResponseRecovery.js';
import { areSkillsSimilar, dedupeById, filterSimilarSkills } from './SkillSimilarity.js';

// =============================================================================
// TYPES
// =============================================================================

export interface SkillSearchSession {
  search(query: string, limit: number): Promise<SkillRecord[]>;
}

export interface SkillSearchProvider {
  session(): Promise<SkillSearchSession>;
}

export interface RecommendationRequest {
  roleTitle: string;
  conversationHistory?: ConversationTurn[];
  /** Answer to the previous follow-up question, appended as a user turn */
  answer?: string;
}

export const RECOMMENDED_SKILL_COUNT = 6;
const KEYWORD_SEARCH_LIMIT = 5;
const BROADER_SEARCH_LIMIT = 10;

const RECOMMEND_OPTIONS = { temperature: 0.7, maxTokens: 1000 };

const DEFAULT_REASONING = 'Skills recommended based on role analysis';

// =============================================================================
// PROMPT
// =============================================================================

export function buildConversationContext(roleTitle: string, history: ConversationTurn[]): string {
  let context = `Role Title: ${roleTitle}\n\n`;

  if (history.length > 0) {
    context += 'Conversation History:\n';
    for (const turn of history) {
      context += `${turn.role}: ${turn.content}\n`;
    }
    context += '\n';
  }

  return context;
}

export function buildRecommendationPrompt(roleTitle: string, history: ConversationTurn[]): string {
  return withJsonReminder(
    buildPrompt(RECOMMENDATION_PROMPT, {
      conversation_context: buildConversationContext(roleTitle, history),
    })
  );
}

// =============================================================================
// TAXONOMY SEARCH
// =============================================================================

async function searchOrEmpty(session: SkillSearchSession, query: string, limit: number): Promise<SkillRecord[]> {
  try {
    return await session.search(query, limit);
  } catch (error) {
    console.error(`[SkillRecommender] Error searching for skill "${query}":`, error);
    return [];
  }
}

/** First word of each keyword, in keyword order */
export function broaderSearchTerms(keywords: string[]): string[] {
  return keywords
    .map((keyword) => keyword.trim().toLowerCase().split(/\s+/)[0])
    .filter((term) => term.length > 0);
}

/**
 * Resolve keywords to at most six mutually dissimilar taxonomy skills.
 *
 * Keyword searches run concurrently. If fewer than six survive
 * de-duplication, broader single-word searches top the set up one at a
 * time, each hit checked against everything accepted so far.
 */
export async function searchRecommendedSkills(
  session: SkillSearchSession,
  keywords: string[]
): Promise<SkillRecord[]> {
  const seenIds = new Set<string>();

  // A blank query would list skills unfiltered
  const queries = keywords.map((keyword) => keyword.trim()).filter((keyword) => keyword.length > 0);

  const results = await Promise.all(
    queries.map((keyword) => searchOrEmpty(session, keyword, KEYWORD_SEARCH_LIMIT))
  );
  const accepted = filterSimilarSkills(dedupeById(results.flat(), seenIds)).slice(0, RECOMMENDED_SKILL_COUNT);

  for (const term of broaderSearchTerms(keywords)) {
    if (accepted.length >= RECOMMENDED_SKILL_COUNT) break;

    const hits = await searchOrEmpty(session, term, BROADER_SEARCH_LIMIT);
    for (const hit of hits) {
      if (accepted.length >= RECOMMENDED_SKILL_COUNT) break;
      if (!hit.id || seenIds.has(hit.id)) continue;
      if (accepted.some((existing) => areSkillsSimilar(hit.name, existing.name))) continue;

      seenIds.add(hit.id);
      accepted.push(hit);
    }
  }

  return accepted;
}

// =============================================================================
// SKILL RECOMMENDER
// =============================================================================

export class SkillRecommender {
  constructor(
    private completion: CompletionClient = new ConfiguredCompletionClient(),
    private taxonomy: SkillSearchProvider = getLightcastClient()
  ) {}

  async recommend(request: RecommendationRequest): Promise<RecommendationResult> {
    const roleTitle = request.roleTitle.trim();
    if (!roleTitle) {
      throw new RangeError('Role title is required');
    }

    const history: ConversationTurn[] = [...(request.conversationHistory ?? [])];
    const answer = request.answer?.trim();
    if (answer) {
      history.push({ role: 'user', content: answer });
    }

    console.log(`[SkillRecommender] Recommending skills for "${roleTitle}" (${history.length} prior turn(s))`);

    const text = await this.completion.complete(buildRecommendationPrompt(roleTitle, history), RECOMMEND_OPTIONS);
    const payload = unwrapRecovery(recoverCompletion('recommendation', text));

    if (payload.type === 'follow_up') {
      return {
        type: 'follow_up',
        question: payload.question,
        conversationHistory: [...history, { role: 'assistant', content: payload.question }],
      };
    }

    const reasoning = payload.reasoning || DEFAULT_REASONING;

    let session: SkillSearchSession;
    try {
      session = await this.taxonomy.session();
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Failed to search Lightcast API';
      console.error('[SkillRecommender] Error searching Lightcast API:', message);
      return { type: 'skills', skills: [], reasoning, keywords: payload.keywords, searchError: message };
    }

    const skills = await searchRecommendedSkills(session, payload.keywords);
    console.log(`[SkillRecommender] Resolved ${skills.length} skill(s) from keywords: ${payload.keywords.join(', ')}`);

    return { type: 'skills', skills, reasoning, keywords: payload.keywords };
  }

  /**
   * Recommend skills for each role in turn. A role for which the backend
   * still asks a question, or whose call fails, is recorded as a failure.
   */
  async recommendForRoles(roles: RoleSpec[]): Promise<BatchOutcome<RoleSpec, RoleSkillSet>> {
    const succeeded: RoleSkillSet[] = [];
    const failures: BatchOutcome<RoleSpec, RoleSkillSet>['failures'] = [];

    for (const role of roles) {
      try {
        const result = await this.recommend({
          roleTitle: role.title,
          conversationHistory: roleTranscript(role),
        });

        if (result.type === 'follow_up') {
          failures.push({ item: role, error: `More context needed: ${result.question}` });
          continue;
        }

        const skillSet: RoleSkillSet = {
          role,
          skills: result.skills,
          reasoning: result.reasoning,
          keywords: result.keywords,
        };
        if (result.searchError) skillSet.searchError = result.searchError;
        succeeded.push(skillSet);
      } catch (error) {
        const message = error instanceof Error ? error.message : `Failed to recommend skills for ${role.title}`;
        console.error(`[SkillRecommender] Recommendation error for ${role.title}:`, message);
        failures.push({ item: role, error: message });
      }
    }

    console.log(`[SkillRecommender] Generated skills for ${succeeded.length}/${roles.length} role(s)`);
    return { succeeded, failures, successCount: succeeded.length };
  }
}

/**
 * Transcript used for batch recommendations, where nobody can answer a
 * follow-up question
 */
export function roleTranscript(role: RoleSpec): ConversationTurn[] {
  const details = [`Headcount: ${role.count}`];
  if (role.description) details.push(`Responsibilities: ${role.description}`);

  return [
    { role: 'user', content: `Role: ${role.title}` },
    {
      role: 'user',
      content: `${details.join('. ')}. Recommend the 6 skills now without asking a follow-up question.`,
    },
  ];
}

// =============================================================================
// SINGLETON
// =============================================================================

let recommenderInstance: SkillRecommender | null = null;

export function getSkillRecommender(): SkillRecommender {
  if (!recommenderInstance) {
    recommenderInstance = new SkillRecommender();
  }
  return recommenderInstance;
}
