/**
 * Skill Similarity Tests
 */

import { describe, it, expect } from '@jest/globals';
import {
  areSkillsSimilar,
  dedupeById,
  filterSimilarSkills,
  normalizeSkillName,
} from '../../domain/services/SkillSimilarity.js';
import { skill } from '../helpers/fakes.js';

const names = (records: Array<{ name: string }>) => records.map((r) => r.name);

describe('SkillSimilarity', () => {
  describe('normalizeSkillName', () => {
    it('lowercases, strips punctuation and trims', () => {
      expect(normalizeSkillName('  C++ / Qt!  ')).toBe('c  qt');
      expect(normalizeSkillName('Node.js')).toBe('nodejs');
    });
  });

  describe('areSkillsSimilar', () => {
    it('matches names equal after normalization', () => {
      expect(areSkillsSimilar('Python', 'python!')).toBe(true);
    });

    it('matches a short name contained in a slightly longer one', () => {
      expect(areSkillsSimilar('Python', 'Python Programming')).toBe(true);
      expect(areSkillsSimilar('Project Management', 'Agile Project Management')).toBe(true);
    });

    it('ignores containment when the longer name has many more words', () => {
      expect(areSkillsSimilar('Sales', 'Enterprise Software Sales Team Leadership')).toBe(false);
    });

    it('matches one differing word sharing a five-letter stem', () => {
      expect(areSkillsSimilar('Data Analysis', 'Data Analytics')).toBe(true);
      expect(areSkillsSimilar('Financial Modeling', 'Financial Modelling')).toBe(true);
    });

    it('keeps distinct words apart', () => {
      expect(areSkillsSimilar('Data Mining', 'Data Modeling')).toBe(false);
      expect(areSkillsSimilar('SQL', 'Python')).toBe(false);
      expect(areSkillsSimilar('Machine Learning', 'Deep Learning')).toBe(false);
    });

    it('is symmetric', () => {
      const pairs: Array<[string, string]> = [
        ['Python Programming', 'Python'],
        ['Data Analytics', 'Data Analysis'],
        ['Data Modeling', 'Data Mining'],
      ];
      for (const [a, b] of pairs) {
        expect(areSkillsSimilar(a, b)).toBe(areSkillsSimilar(b, a));
      }
    });

    describe('known false positives', () => {
      it('treats a name contained in a longer word as similar', () => {
        expect(areSkillsSimilar('Java', 'JavaScript')).toBe(true);
      });

      it('compares the whole of a differing word shorter than five letters', () => {
        expect(areSkillsSimilar('Go Basics', 'Good Basics')).toBe(true);
      });
    });
  });

  describe('dedupeById', () => {
    it('drops repeated and missing ids, keeping first-seen order', () => {
      const records = [skill('a', 'Python'), skill('', 'Nameless'), skill('b', 'SQL'), skill('a', 'Python 3')];
      expect(dedupeById(records)).toEqual([skill('a', 'Python'), skill('b', 'SQL')]);
    });

    it('records accepted ids in the shared set', () => {
      const seen = new Set(['b']);
      expect(dedupeById([skill('a', 'Python'), skill('b', 'SQL')], seen)).toEqual([skill('a', 'Python')]);
      expect(Array.from(seen)).toEqual(['b', 'a']);
    });
  });

  describe('filterSimilarSkills', () => {
    it('keeps the first of each similar group', () => {
      const records = [skill('1', 'Python'), skill('2', 'Python Programming'), skill('3', 'Java')];
      expect(names(filterSimilarSkills(records))).toEqual(['Python', 'Java']);
    });

    it('collapses near-duplicate analytics names', () => {
      const records = [skill('1', 'Data Analysis'), skill('2', 'Data Analytics')];
      expect(names(filterSimilarSkills(records))).toEqual(['Data Analysis']);
    });

    it('checks candidates against an already accepted set', () => {
      const records = [skill('2', 'Python Scripting'), skill('3', 'Rust')];
      expect(names(filterSimilarSkills(records, [skill('1', 'Python')]))).toEqual(['Rust']);
    });

    it('is idempotent', () => {
      const records = [
        skill('1', 'Data Analysis'),
        skill('2', 'Data Analytics'),
        skill('3', 'Tableau'),
        skill('4', 'Tableau Desktop'),
        skill('5', 'Statistics'),
      ];
      const once = filterSimilarSkills(records);
      expect(filterSimilarSkills(once)).toEqual(once);
      expect(names(once)).toEqual(['Data Analysis', 'Tableau', 'Statistics']);
    });
  });
});
