/**
 * Response Recovery - JSON extraction and validation for completion text
 *
 * Completion backends are asked for bare JSON but often wrap it in markdown
 * fences or add prose around it. Recovery runs in two stages:
 *
 * 1. Extraction: direct parse, then the first ```json fence, or the first
 *    plain ``` fence when there is no ```json fence.
 * 2. Validation: a zod schema per use case (transform, roles, recommendation).
 *
 * Both stages return a RecoveryResult instead of throwing; callers that want
 * an exception use unwrapRecovery().
 */

import { z } from 'zod';
import type { TransformedSkill } from '../entities/Skill.js';
import type { RoleSpec } from '../entities/Recommendation.js';

// =============================================================================
// RESULT TYPES
// =============================================================================

export type RecoveryFailure =
  | { kind: 'MalformedCompletion'; snippet: string }
  | { kind: 'InvalidTransformShape'; issues: string[] }
  | { kind: 'MissingRoles' }
  | { kind: 'NoValidRoles' }
  | { kind: 'InvalidRecommendationShape'; issues: string[] };

export type RecoveryFailureKind = RecoveryFailure['kind'];

export type RecoveryResult<T> = { ok: true; value: T } | { ok: false; failure: RecoveryFailure };

export type ExtractionStrategy = 'direct' | 'json_fence' | 'any_fence';

export type ExtractionResult =
  | { ok: true; value: unknown; strategy: ExtractionStrategy }
  | { ok: false; failure: Extract<RecoveryFailure, { kind: 'MalformedCompletion' }> };

/** Longest prefix of the raw completion kept for diagnostics */
export const SNIPPET_LENGTH = 500;

// =============================================================================
// ERRORS
// =============================================================================

export type RecoveryErrorCode =
  | 'MALFORMED_COMPLETION'
  | 'INVALID_TRANSFORM_SHAPE'
  | 'MISSING_ROLES'
  | 'NO_VALID_ROLES'
  | 'INVALID_RECOMMENDATION_SHAPE';

const FAILURE_CODES: Record<RecoveryFailureKind, RecoveryErrorCode> = {
  MalformedCompletion: 'MALFORMED_COMPLETION',
  InvalidTransformShape: 'INVALID_TRANSFORM_SHAPE',
  MissingRoles: 'MISSING_ROLES',
  NoValidRoles: 'NO_VALID_ROLES',
  InvalidRecommendationShape: 'INVALID_RECOMMENDATION_SHAPE',
};

export function describeFailure(failure: RecoveryFailure): string {
  switch (failure.kind) {
    case 'MalformedCompletion':
      return 'Failed to parse JSON response';
    case 'InvalidTransformShape':
      return `Invalid transform response format: ${failure.issues.join('; ')}`;
    case 'MissingRoles':
      return "Invalid response format - expected 'roles' array";
    case 'NoValidRoles':
      return 'No valid roles generated';
    case 'InvalidRecommendationShape':
      return `Invalid recommendation response format: ${failure.issues.join('; ')}`;
  }
}

export class RecoveryError extends Error {
  public code: RecoveryErrorCode;
  public details: Record<string, unknown>;

  constructor(public failure: RecoveryFailure) {
    super(describeFailure(failure));
    this.name = 'RecoveryError';
    this.code = FAILURE_CODES[failure.kind];
    this.details = { ...failure };
  }
}

export function unwrapRecovery<T>(result: RecoveryResult<T>): T {
  if (!result.ok) {
    throw new RecoveryError(result.failure);
  }
  return result.value;
}

// =============================================================================
// EXTRACTION
// =============================================================================

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch {
    return { ok: false };
  }
}

function jsonFenceBody(text: string): string | null {
  const marker = '```json';
  const start = text.indexOf(marker);
  if (start === -1) return null;

  const rest = text.slice(start + marker.length);
  const end = rest.indexOf('```');
  return (end === -1 ? rest : rest.slice(0, end)).trim();
}

function anyFenceBody(text: string): string | null {
  const parts = text.split('```');
  if (parts.length < 2) return null;
  return parts[1].trim();
}

/**
 * Pull a JSON value out of free-form completion text
 */
export function extractJson(raw: string): ExtractionResult {
  const text = raw.trim();

  const direct = tryParse(text);
  if (direct.ok) return { ok: true, value: direct.value, strategy: 'direct' };

  // A plain fence is only consulted when no json fence exists
  const jsonBody = jsonFenceBody(text);
  if (jsonBody !== null) {
    const fenced = tryParse(jsonBody);
    if (fenced.ok) return { ok: true, value: fenced.value, strategy: 'json_fence' };
  }

  const anyBody = jsonBody === null ? anyFenceBody(text) : null;
  if (anyBody !== null) {
    const fenced = tryParse(anyBody);
    if (fenced.ok) return { ok: true, value: fenced.value, strategy: 'any_fence' };
  }

  const snippet = raw.slice(0, SNIPPET_LENGTH);
  console.error('[ResponseRecovery] Failed to parse JSON response. Response text:', snippet);
  return { ok: false, failure: { kind: 'MalformedCompletion', snippet } };
}

// =============================================================================
// SCHEMAS
// =============================================================================

const statementsSchema = z.array(z.string());

export const rubricLevelsSchema = z
  .object({
    poor: statementsSchema,
    basic: statementsSchema,
    intermediate: statementsSchema,
    advanced: statementsSchema,
    exceptional: statementsSchema,
  })
  .strict();

export const transformedSkillSchema = z.object({
  name: z.string(),
  description: z.string(),
  lightcast_id: z.string(),
  levels: rubricLevelsSchema,
});

const rolesEnvelopeSchema = z.object({
  roles: z.array(z.unknown()),
});

const roleCandidateSchema = z.object({
  title: z.string().trim().min(1),
  count: z.number().finite(),
  description: z.unknown().optional(),
});

export const recommendationPayloadSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('follow_up'),
    question: z.string().trim().min(1),
  }),
  z.object({
    type: z.literal('skills'),
    skills: z.array(z.string()).length(6),
    reasoning: z.unknown().optional(),
  }),
]);

export interface FollowUpPayload {
  type: 'follow_up';
  question: string;
}

export interface KeywordsPayload {
  type: 'skills';
  keywords: string[];
  reasoning?: string;
}

export type RecommendationPayload = FollowUpPayload | KeywordsPayload;

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

// =============================================================================
// VALIDATORS
// =============================================================================

export function validateTransformedSkill(value: unknown): RecoveryResult<TransformedSkill> {
  const parsed = transformedSkillSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, failure: { kind: 'InvalidTransformShape', issues: issuesOf(parsed.error) } };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Roles missing a title or a numeric count are dropped rather than failing
 * the whole payload. Counts are floored and clamped to at least 1.
 */
export function validateRoles(value: unknown): RecoveryResult<RoleSpec[]> {
  const envelope = rolesEnvelopeSchema.safeParse(value);
  if (!envelope.success) {
    return { ok: false, failure: { kind: 'MissingRoles' } };
  }

  const roles: RoleSpec[] = [];
  for (const candidate of envelope.data.roles) {
    const parsed = roleCandidateSchema.safeParse(candidate);
    if (!parsed.success) continue;

    const role: RoleSpec = {
      title: parsed.data.title,
      count: Math.max(1, Math.floor(parsed.data.count)),
    };
    if (typeof parsed.data.description === 'string' && parsed.data.description.trim()) {
      role.description = parsed.data.description.trim();
    }
    roles.push(role);
  }

  if (roles.length === 0) {
    return { ok: false, failure: { kind: 'NoValidRoles' } };
  }
  return { ok: true, value: roles };
}

export function validateRecommendation(value: unknown): RecoveryResult<RecommendationPayload> {
  const parsed = recommendationPayloadSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, failure: { kind: 'InvalidRecommendationShape', issues: issuesOf(parsed.error) } };
  }

  const payload = parsed.data;
  if (payload.type === 'follow_up') {
    return { ok: true, value: { type: 'follow_up', question: payload.question } };
  }

  const result: KeywordsPayload = { type: 'skills', keywords: payload.skills };
  if (typeof payload.reasoning === 'string' && payload.reasoning) result.reasoning = payload.reasoning;
  return { ok: true, value: result };
}

// =============================================================================
// PIPELINE
// =============================================================================

export interface RecoveryUseCases {
  transform: TransformedSkill;
  roles: RoleSpec[];
  recommendation: RecommendationPayload;
}

export type RecoveryUseCase = keyof RecoveryUseCases;

const VALIDATORS: { [K in RecoveryUseCase]: (value: unknown) => RecoveryResult<RecoveryUseCases[K]> } = {
  transform: validateTransformedSkill,
  roles: validateRoles,
  recommendation: validateRecommendation,
};

/**
 * Extract and validate a completion for one use case
 */
export function recoverCompletion<K extends RecoveryUseCase>(
  useCase: K,
  raw: string
): RecoveryResult<RecoveryUseCases[K]> {
  const extracted = extractJson(raw);
  if (!extracted.ok) return extracted;

  const validate: (value: unknown) => RecoveryResult<RecoveryUseCases[K]> = VALIDATORS[useCase];
  const result = validate(extracted.value);
  if (!result.ok) {
    console.error(`[ResponseRecovery] ${useCase} payload rejected: ${describeFailure(result.failure)}`);
  }
  return result;
}
