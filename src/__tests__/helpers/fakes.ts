/**
 * In-process stand-ins for the completion backend and the skills taxonomy
 */

import type { CompletionClient, CompletionOptions } from '../../integrations/llm/CompletionClient.js';
import type { SkillSearchProvider, SkillSearchSession } from '../../domain/services/SkillRecommender.js';
import type { RubricLevels, SkillRecord } from '../../domain/entities/Skill.js';

export class FakeCompletion implements CompletionClient {
  readonly provider = 'fake';
  readonly prompts: string[] = [];
  readonly options: CompletionOptions[] = [];
  private replies: Array<string | Error> = [];

  reply(...replies: Array<string | Error>): this {
    this.replies.push(...replies);
    return this;
  }

  reset(): void {
    this.replies = [];
    this.prompts.length = 0;
    this.options.length = 0;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    this.prompts.push(prompt);
    this.options.push(options);

    const next = this.replies.shift();
    if (next === undefined) throw new Error('No scripted completion left');
    if (next instanceof Error) throw next;
    return next;
  }
}

export class FakeSkillSearch implements SkillSearchProvider, SkillSearchSession {
  readonly calls: Array<{ query: string; limit: number }> = [];
  sessionError: Error | null = null;
  private results = new Map<string, SkillRecord[] | Error>();

  on(query: string, limit: number, result: SkillRecord[] | Error): this {
    this.results.set(`${query}|${limit}`, result);
    return this;
  }

  reset(): void {
    this.results.clear();
    this.calls.length = 0;
    this.sessionError = null;
  }

  async session(): Promise<SkillSearchSession> {
    if (this.sessionError) throw this.sessionError;
    return this;
  }

  async search(query: string, limit: number): Promise<SkillRecord[]> {
    this.calls.push({ query, limit });
    const result = this.results.get(`${query}|${limit}`);
    if (result instanceof Error) throw result;
    return result ?? [];
  }
}

export function skill(id: string, name: string): SkillRecord {
  return { id, name };
}

/** Rubric levels with the given number of statements per level */
export function levels(counts: Record<keyof RubricLevels, number>): RubricLevels {
  const statements = (level: string, n: number) =>
    Array.from({ length: n }, (_, i) => `${level} statement ${i + 1}`);

  return {
    poor: statements('poor', counts.poor),
    basic: statements('basic', counts.basic),
    intermediate: statements('intermediate', counts.intermediate),
    advanced: statements('advanced', counts.advanced),
    exceptional: statements('exceptional', counts.exceptional),
  };
}

export const IN_RANGE_COUNTS = { poor: 2, basic: 3, intermediate: 3, advanced: 4, exceptional: 2 };

export function rubricReply(id: string, name: string, counts = IN_RANGE_COUNTS): string {
  return JSON.stringify({
    name,
    description: `${name} rubric`,
    lightcast_id: id,
    levels: levels(counts),
  });
}

export function keywordsReply(keywords: string[], reasoning?: string): string {
  return JSON.stringify({ type: 'skills', skills: keywords, ...(reasoning ? { reasoning } : {}) });
}
