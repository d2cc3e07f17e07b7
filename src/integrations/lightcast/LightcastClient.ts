/**
 * Lightcast API Client - Skills taxonomy gateway
 *
 * Provides authenticated access to the Lightcast Open Skills API:
 * - Keyword search and listing by skill type
 * - Single skill lookup
 * - Skill type discovery and per-type counts
 *
 * Every operation authenticates afresh. A LightcastSession binds one token
 * to a batch of calls made while serving a single request.
 *
 * API Docs: https://docs.lightcast.dev/apis/skills
 */

import { getLightcastConfig, type LightcastConfig } from '../../infrastructure/config/env.js';
import type { SkillRecord } from '../../domain/entities/Skill.js';
import { LightcastAuth } from './LightcastAuth.js';
import { LightcastError } from './errors.js';
import {
  apiSkillSchema,
  skillDetailResponseSchema,
  skillListResponseSchema,
  skillTypeSchema,
  DEFAULT_SKILL_LIMIT,
  SKILL_FIELDS,
  TYPE_SAMPLE_SIZE,
  type ApiSkill,
  type SkillCounts,
  type SkillQuery,
  type SkillTypesResult,
} from './types.js';

// =============================================================================
// PAYLOAD HELPERS
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getPath(value: unknown, path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

/** Envelope shapes the versions endpoint has been seen to use, in lookup order */
const TYPE_LIST_PATHS: string[][] = [
  ['attributions', 'types'],
  ['types'],
  ['data', 'attributions', 'types'],
  ['data', 'types'],
];

export function extractTypeList(payload: unknown): unknown[] {
  for (const path of TYPE_LIST_PATHS) {
    const candidate = getPath(payload, path);
    if (Array.isArray(candidate)) return candidate;
  }
  return Array.isArray(payload) ? payload : [];
}

function toSkillTypes(items: unknown[]): Array<{ id: string; name: string }> {
  const types: Array<{ id: string; name: string }> = [];
  for (const item of items) {
    const parsed = skillTypeSchema.safeParse(item);
    if (parsed.success) types.push(parsed.data);
  }
  return types;
}

export function toSkillRecord(skill: ApiSkill): SkillRecord {
  const record: SkillRecord = { id: skill.id, name: skill.name };
  if (skill.type) record.type = { id: skill.type.id, name: skill.type.name };
  if (skill.description) record.description = skill.description;
  if (skill.infoUrl) record.infoUrl = skill.infoUrl;
  return record;
}

function toSkillRecords(items: unknown[]): SkillRecord[] {
  const records: SkillRecord[] = [];
  for (const item of items) {
    const parsed = apiSkillSchema.safeParse(item);
    if (parsed.success) records.push(toSkillRecord(parsed.data));
  }
  return records;
}

// =============================================================================
// SESSION
// =============================================================================

export class LightcastSession {
  constructor(
    private token: string,
    private apiUrl: string
  ) {}

  /**
   * Search skills by keyword, optionally restricted to one skill type
   */
  async listSkills(query: SkillQuery = {}): Promise<SkillRecord[]> {
    const params = new URLSearchParams({
      fields: SKILL_FIELDS,
      limit: String(query.limit ?? DEFAULT_SKILL_LIMIT),
    });
    if (query.query) params.append('q', query.query);
    if (query.typeId) params.append('typeIds', query.typeId);

    const payload = await this.get('/skills', params, 'skill search');
    const parsed = skillListResponseSchema.safeParse(payload);
    if (!parsed.success) return [];

    return toSkillRecords(parsed.data.data ?? []);
  }

  async search(query: string, limit: number = DEFAULT_SKILL_LIMIT): Promise<SkillRecord[]> {
    return this.listSkills({ query, limit });
  }

  async listByType(typeId: string, limit: number = DEFAULT_SKILL_LIMIT): Promise<SkillRecord[]> {
    return this.listSkills({ typeId, limit });
  }

  /**
   * Get a single skill by its taxonomy id. Returns null when Lightcast has no such skill.
   */
  async getSkill(id: string): Promise<SkillRecord | null> {
    const params = new URLSearchParams({ fields: SKILL_FIELDS });
    const payload = await this.get(`/skills/${encodeURIComponent(id)}`, params, 'skill lookup', true);
    if (payload === null) return null;

    const parsed = skillDetailResponseSchema.safeParse(payload);
    if (!parsed.success) return null;

    const skill = apiSkillSchema.safeParse(parsed.data.data);
    return skill.success ? toSkillRecord(skill.data) : null;
  }

  /**
   * List skill types.
   *
   * Falls back to deriving types from a sample of skills when the versions
   * payload carries none. When that also fails the raw payload is returned
   * for diagnostics.
   */
  async listTypes(): Promise<SkillTypesResult> {
    const payload = await this.get('', new URLSearchParams(), 'type listing');
    let types = toSkillTypes(extractTypeList(payload));

    if (types.length === 0) {
      types = await this.sampleTypes();
    }

    if (types.length === 0) {
      console.error('[LightcastClient] No types found in versions payload:', JSON.stringify(payload, null, 2));
      return { types, debug: payload };
    }

    return { types };
  }

  /**
   * Count skills per type. Types come from the versions payload; a failed
   * count reports 0 for that type.
   */
  async countsByType(): Promise<SkillCounts> {
    const payload = await this.get('', new URLSearchParams(), 'type listing');
    const types = toSkillTypes(extractTypeList(payload));

    const results = await Promise.all(
      types.map(async (type) => ({ typeId: type.id, count: await this.countType(type.id) }))
    );

    const counts: SkillCounts = {};
    for (const { typeId, count } of results) {
      counts[typeId] = count;
    }
    return counts;
  }

  private async countType(typeId: string): Promise<number> {
    const params = new URLSearchParams({ fields: 'id', typeIds: typeId, limit: '1' });
    try {
      const payload = await this.get('/skills', params, 'type count');
      const parsed = skillListResponseSchema.safeParse(payload);
      if (!parsed.success) return 0;
      return parsed.data.meta?.total || parsed.data.data?.length || 0;
    } catch (error) {
      console.error(`[LightcastClient] Count failed for type ${typeId}:`, error);
      return 0;
    }
  }

  private async sampleTypes(): Promise<Array<{ id: string; name: string }>> {
    const params = new URLSearchParams({ fields: 'id,name,type', limit: String(TYPE_SAMPLE_SIZE) });
    try {
      const payload = await this.get('/skills', params, 'type sampling');
      const parsed = skillListResponseSchema.safeParse(payload);
      if (!parsed.success) return [];

      const byId = new Map<string, { id: string; name: string }>();
      for (const skill of toSkillRecords(parsed.data.data ?? [])) {
        if (skill.type && !byId.has(skill.type.id)) {
          byId.set(skill.type.id, skill.type);
        }
      }
      return Array.from(byId.values());
    } catch (error) {
      console.error('[LightcastClient] Failed to extract types from skills:', error);
      return [];
    }
  }

  // ===========================================================================
  // HTTP CLIENT
  // ===========================================================================

  private async get(
    path: string,
    params: URLSearchParams,
    operation: string,
    allowNotFound = false
  ): Promise<unknown> {
    const query = params.toString();
    const url = `${this.apiUrl}${path}${query ? `?${query}` : ''}`;

    const response = await fetch(url, {
      headers: { Authorization: `Bearer ${this.token}` },
    }).catch((error: unknown) => {
      console.error(`[LightcastClient] ${operation} could not be sent:`, error);
      throw LightcastError.unreachable(operation, error);
    });

    if (!response.ok) {
      if (allowNotFound && response.status === 404) return null;

      const body = await response.text();
      console.error(`[LightcastClient] ${operation} failed: ${response.status}`, body);
      throw LightcastError.upstream(operation, response.status, response.statusText, body);
    }

    try {
      const payload: unknown = await response.json();
      return payload;
    } catch (error) {
      throw new LightcastError(`Lightcast ${operation} returned invalid JSON`, 'UPSTREAM_UNAVAILABLE', {
        operation,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

// =============================================================================
// CLIENT
// =============================================================================

export class LightcastClient {
  constructor(
    private auth: LightcastAuth = new LightcastAuth(),
    private readConfig: () => LightcastConfig = () => getLightcastConfig()
  ) {}

  /**
   * Authenticate once and return a session for a batch of calls
   */
  async session(): Promise<LightcastSession> {
    const token = await this.auth.getToken();
    return new LightcastSession(token, this.readConfig().apiUrl);
  }

  async getToken(): Promise<string> {
    return this.auth.getToken();
  }

  async search(query: string, limit?: number): Promise<SkillRecord[]> {
    return (await this.session()).search(query, limit);
  }

  async listSkills(query: SkillQuery): Promise<SkillRecord[]> {
    return (await this.session()).listSkills(query);
  }

  async listByType(typeId: string, limit?: number): Promise<SkillRecord[]> {
    return (await this.session()).listByType(typeId, limit);
  }

  async getSkill(id: string): Promise<SkillRecord | null> {
    return (await this.session()).getSkill(id);
  }

  async listTypes(): Promise<SkillTypesResult> {
    return (await this.session()).listTypes();
  }

  async countsByType(): Promise<SkillCounts> {
    return (await this.session()).countsByType();
  }
}

// =============================================================================
// SINGLETON
// =============================================================================

let clientInstance: LightcastClient | null = null;

export function getLightcastClient(): LightcastClient {
  if (!clientInstance) {
    clientInstance = new LightcastClient();
  }
  return clientInstance;
}
