/**
 * Response Recovery Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  extractJson,
  recoverCompletion,
  unwrapRecovery,
  validateRecommendation,
  validateRoles,
  validateTransformedSkill,
  RecoveryError,
  SNIPPET_LENGTH,
} from '../../domain/services/index.js';
import { levels, IN_RANGE_COUNTS } from '../helpers/fakes.js';

describe('ResponseRecovery', () => {
  beforeEach(() => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('extractJson', () => {
    it('parses bare JSON directly', () => {
      expect(extractJson('  {"a": 1, "b": [true]}  ')).toEqual({
        ok: true,
        value: { a: 1, b: [true] },
        strategy: 'direct',
      });
    });

    it('reads the first json fence', () => {
      const text = 'Here you go:\n```json\n{"a": 1}\n```\nand another ```json\n{"a": 2}\n```';
      expect(extractJson(text)).toEqual({ ok: true, value: { a: 1 }, strategy: 'json_fence' });
    });

    it('yields the same object fenced or bare', () => {
      const bare = extractJson('{"roles": []}');
      const fenced = extractJson('```json\n{"roles": []}\n```');
      expect(fenced).toEqual({ ...bare, strategy: 'json_fence' });
    });

    it('falls back to a plain fence', () => {
      const text = 'Sure!\n```\n{"type": "follow_up", "question": "Which stack?"}\n```\nThanks';
      expect(extractJson(text)).toEqual({
        ok: true,
        value: { type: 'follow_up', question: 'Which stack?' },
        strategy: 'any_fence',
      });
    });

    it('fails when the only fence holds invalid JSON', () => {
      expect(extractJson('```json\n{broken\n```')).toEqual({
        ok: false,
        failure: { kind: 'MalformedCompletion', snippet: '```json\n{broken\n```' },
      });
    });

    it('ignores a plain fence when a json fence is present', () => {
      const text = '```\n{"a":1}\n```\n```json\n{bad}\n```';
      expect(extractJson(text)).toEqual({
        ok: false,
        failure: { kind: 'MalformedCompletion', snippet: text },
      });
    });

    it('reports text without JSON as a malformed completion', () => {
      expect(extractJson('I cannot help with that.')).toEqual({
        ok: false,
        failure: { kind: 'MalformedCompletion', snippet: 'I cannot help with that.' },
      });
    });

    it('truncates the diagnostic snippet', () => {
      const result = extractJson('x'.repeat(SNIPPET_LENGTH + 300));
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.failure.snippet).toHaveLength(SNIPPET_LENGTH);
      }
    });
  });

  describe('validateTransformedSkill', () => {
    const valid = {
      name: 'Python',
      description: 'General-purpose programming language',
      lightcast_id: 'KS1',
      levels: levels(IN_RANGE_COUNTS),
    };

    it('accepts a complete rubric', () => {
      expect(validateTransformedSkill(valid)).toEqual({ ok: true, value: valid });
    });

    it('rejects a missing level', () => {
      const { exceptional: _dropped, ...partial } = valid.levels;
      const result = validateTransformedSkill({ ...valid, levels: partial });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.failure.kind).toBe('InvalidTransformShape');
    });

    it('rejects levels outside the five proficiency keys', () => {
      const result = validateTransformedSkill({ ...valid, levels: { ...valid.levels, expert: ['x'] } });
      expect(result.ok).toBe(false);
    });

    it('rejects non-string statements', () => {
      const result = validateTransformedSkill({ ...valid, levels: { ...valid.levels, basic: [1, 2] } });
      expect(result.ok).toBe(false);
    });
  });

  describe('validateRoles', () => {
    it('drops invalid roles and normalizes counts', () => {
      const result = validateRoles({
        roles: [
          { title: ' Software Engineer ', count: 2.7, description: ' Builds the product ' },
          { count: 3, description: 'No title' },
          { title: 'Founder', count: 0 },
          { title: 'Designer', count: '2' },
          { title: 'Recruiter', count: 1, description: 42 },
        ],
      });

      expect(result).toEqual({
        ok: true,
        value: [
          { title: 'Software Engineer', count: 2, description: 'Builds the product' },
          { title: 'Founder', count: 1 },
          { title: 'Recruiter', count: 1 },
        ],
      });
    });

    it('requires a roles array', () => {
      expect(validateRoles({ positions: [] })).toEqual({ ok: false, failure: { kind: 'MissingRoles' } });
      expect(validateRoles({ roles: 'CEO' })).toEqual({ ok: false, failure: { kind: 'MissingRoles' } });
    });

    it('fails when every role is invalid', () => {
      expect(validateRoles({ roles: [{ count: 1 }, { title: '', count: 2 }] })).toEqual({
        ok: false,
        failure: { kind: 'NoValidRoles' },
      });
    });
  });

  describe('validateRecommendation', () => {
    const keywords = ['Python', 'SQL', 'Docker', 'Kubernetes', 'Git', 'REST APIs'];

    it('accepts a follow-up question', () => {
      expect(validateRecommendation({ type: 'follow_up', question: 'Which cloud?' })).toEqual({
        ok: true,
        value: { type: 'follow_up', question: 'Which cloud?' },
      });
    });

    it('accepts six keywords with reasoning', () => {
      expect(validateRecommendation({ type: 'skills', skills: keywords, reasoning: 'Core backend stack' })).toEqual({
        ok: true,
        value: { type: 'skills', keywords, reasoning: 'Core backend stack' },
      });
    });

    it('leaves reasoning out when null', () => {
      const result = validateRecommendation({ type: 'skills', skills: keywords, reasoning: null });
      expect(result.ok && result.value).toStrictEqual({ type: 'skills', keywords });
    });

    it('leaves reasoning out when it is not a string', () => {
      const result = validateRecommendation({ type: 'skills', skills: keywords, reasoning: 42 });
      expect(result.ok && result.value).toStrictEqual({ type: 'skills', keywords });
    });

    it('rejects anything but exactly six keywords', () => {
      const result = validateRecommendation({ type: 'skills', skills: keywords.slice(0, 5) });
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.failure.kind).toBe('InvalidRecommendationShape');
    });

    it('rejects an empty question and unknown types', () => {
      expect(validateRecommendation({ type: 'follow_up', question: '   ' }).ok).toBe(false);
      expect(validateRecommendation({ type: 'summary' }).ok).toBe(false);
    });
  });

  describe('recoverCompletion', () => {
    it('extracts and validates in one step', () => {
      const raw = '```json\n{"roles": [{"title": "CEO", "count": 1}]}\n```';
      expect(recoverCompletion('roles', raw)).toEqual({ ok: true, value: [{ title: 'CEO', count: 1 }] });
    });

    it('reports extraction failures before validation', () => {
      const result = recoverCompletion('transform', 'not json');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.failure.kind).toBe('MalformedCompletion');
    });
  });

  describe('unwrapRecovery', () => {
    it('throws a RecoveryError carrying the failure code', () => {
      const run = () => unwrapRecovery(recoverCompletion('roles', '{"roles": []}'));

      expect(run).toThrow(RecoveryError);
      expect(run).toThrow('No valid roles generated');
      try {
        run();
      } catch (error) {
        expect(error instanceof RecoveryError && error.code).toBe('NO_VALID_ROLES');
      }
    });

    it('keeps the snippet in the error details', () => {
      try {
        unwrapRecovery(recoverCompletion('recommendation', 'oops'));
        throw new Error('expected a RecoveryError');
      } catch (error) {
        expect(error instanceof RecoveryError && error.details).toEqual({
          kind: 'MalformedCompletion',
          snippet: 'oops',
        });
      }
    });
  });
});
