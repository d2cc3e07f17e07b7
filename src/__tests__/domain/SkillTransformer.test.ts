/**
 * Skill Transformer Tests
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import {
  SkillTransformer,
  buildTransformPrompt,
  checkLevelCardinality,
} from '../../domain/services/index.js';
import { JSON_ONLY_REMINDER } from '../../integrations/llm/index.js';
import { FakeCompletion, levels, rubricReply, skill, IN_RANGE_COUNTS } from '../helpers/fakes.js';

describe('SkillTransformer', () => {
  let completion: FakeCompletion;
  let transformer: SkillTransformer;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    completion = new FakeCompletion();
    transformer = new SkillTransformer(completion);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('buildTransformPrompt', () => {
    it('fills name, id and a placeholder description', () => {
      const prompt = buildTransformPrompt(skill('KS120P86XDXZJT3B7KVJ', 'Python (Programming Language)'));

      expect(prompt).toContain('Name: Python (Programming Language)\n');
      expect(prompt).toContain('Description: No description available\n');
      expect(prompt).toContain('Lightcast ID: KS120P86XDXZJT3B7KVJ');
      expect(prompt.endsWith(`\n\n${JSON_ONLY_REMINDER}`)).toBe(true);
    });

    it('inserts descriptions literally', () => {
      const prompt = buildTransformPrompt({ id: 'KS1', name: 'Regex', description: 'Patterns like $& and $1' });
      expect(prompt).toContain('Description: Patterns like $& and $1\n');
    });
  });

  describe('checkLevelCardinality', () => {
    it('reports levels outside the advised range', () => {
      const rubric = {
        name: 'SQL',
        description: 'Query language',
        lightcast_id: 'KS2',
        levels: levels({ poor: 1, basic: 2, intermediate: 4, advanced: 6, exceptional: 3 }),
      };

      expect(checkLevelCardinality(rubric)).toEqual([
        'Level "poor" has 1 statement(s), expected 2-5',
        'Level "advanced" has 6 statement(s), expected 3-5',
      ]);
    });
  });

  describe('transform', () => {
    it('returns the rubric without warnings when counts are in range', async () => {
      completion.reply(rubricReply('KS1', 'Python'));

      const result = await transformer.transform(skill('KS1', 'Python'));

      expect(result.warnings).toEqual([]);
      expect(result.transformed.lightcast_id).toBe('KS1');
      expect(result.transformed.levels).toEqual(levels(IN_RANGE_COUNTS));
      expect(completion.options[0]).toEqual({ temperature: 0.7, maxTokens: 2000 });
    });

    it('keeps an out-of-range rubric and warns', async () => {
      completion.reply(rubricReply('KS1', 'Python', { ...IN_RANGE_COUNTS, exceptional: 4 }));

      const result = await transformer.transform(skill('KS1', 'Python'));

      expect(result.warnings).toEqual(['Level "exceptional" has 4 statement(s), expected 1-3']);
      expect(result.transformed.levels.exceptional).toHaveLength(4);
    });

    it('rejects a reply that is not a rubric', async () => {
      completion.reply('{"name": "Python"}');

      await expect(transformer.transform(skill('KS1', 'Python'))).rejects.toMatchObject({
        code: 'INVALID_TRANSFORM_SHAPE',
      });
    });
  });

  describe('transformMany', () => {
    it('continues past a failed skill', async () => {
      completion.reply(rubricReply('KS1', 'Python'), 'Sorry, I cannot do that.', rubricReply('KS3', 'Docker'));

      const skills = [skill('KS1', 'Python'), skill('KS2', 'SQL'), skill('KS3', 'Docker')];
      const outcome = await transformer.transformMany(skills);

      expect(outcome.successCount).toBe(2);
      expect(outcome.succeeded.map((r) => r.transformed.lightcast_id)).toEqual(['KS1', 'KS3']);
      expect(outcome.failures).toEqual([{ item: skills[1], error: 'Failed to parse JSON response' }]);
    });
  });
});
