/**
 * Recommendation - Roles and AI skill recommendations
 *
 * The recommendation conversation is held by the caller: every request
 * carries the full transcript and every follow-up returns the extended one.
 */

import type { SkillRecord } from './Skill.js';

// =============================================================================
// ROLES
// =============================================================================

export interface RoleSpec {
  title: string;
  /** Headcount, integer >= 1 */
  count: number;
  description?: string;
}

export interface RoleBreakdown {
  roles: RoleSpec[];
  totalPositions: number;
}

// =============================================================================
// CONVERSATION
// =============================================================================

export type ConversationRole = 'user' | 'assistant';

export interface ConversationTurn {
  role: ConversationRole;
  content: string;
}

// =============================================================================
// RESULTS
// =============================================================================

export interface FollowUpRecommendation {
  type: 'follow_up';
  question: string;
  conversationHistory: ConversationTurn[];
}

export interface SkillsRecommendation {
  type: 'skills';
  skills: SkillRecord[];
  reasoning: string;
  keywords: string[];
  /** Set when the taxonomy could not be searched at all */
  searchError?: string;
}

export type RecommendationResult = FollowUpRecommendation | SkillsRecommendation;

export interface RoleSkillSet {
  role: RoleSpec;
  skills: SkillRecord[];
  reasoning: string;
  keywords: string[];
  searchError?: string;
}

// =============================================================================
// BATCHES
// =============================================================================

export interface BatchFailure<T> {
  item: T;
  error: string;
}

export interface BatchOutcome<TItem, TResult> {
  succeeded: TResult[];
  failures: BatchFailure<TItem>[];
  successCount: number;
}
