/**
 * Skill Similarity - Near-duplicate detection by skill name
 *
 * Used when assembling a recommended skill set so that "Python" and
 * "Python Programming", or "Data Analysis" and "Data Analytics", do not
 * both make the cut.
 */

import type { SkillRecord } from '../entities/Skill.js';

// Prefix length compared between the one differing word of two names
const STEM_PREFIX_LENGTH = 5;

// Containment only counts for short names
const MAX_SHORT_NAME_WORDS = 3;
const MAX_WORD_COUNT_DIFF = 2;

// =============================================================================
// NAME COMPARISON
// =============================================================================

export function normalizeSkillName(name: string): string {
  return name.toLowerCase().replace(/[^\w\s]/g, '').trim();
}

function wordsOf(normalized: string): string[] {
  return normalized.split(/\s+/);
}

/**
 * Symmetric similarity predicate:
 * - identical after normalization
 * - one contains the other, word counts within 2, shorter has at most 3 words
 * - same word count (at most 3), exactly one differing word on each side,
 *   and the first five letters of one differing word begin the other
 */
export function areSkillsSimilar(a: string, b: string): boolean {
  const s1 = normalizeSkillName(a);
  const s2 = normalizeSkillName(b);

  if (s1 === s2) return true;

  const words1 = wordsOf(s1);
  const words2 = wordsOf(s2);

  if (s1.includes(s2) || s2.includes(s1)) {
    const diff = Math.abs(words1.length - words2.length);
    if (diff <= MAX_WORD_COUNT_DIFF && Math.min(words1.length, words2.length) <= MAX_SHORT_NAME_WORDS) {
      return true;
    }
  }

  if (words1.length === words2.length && words1.length <= MAX_SHORT_NAME_WORDS) {
    const only1 = words1.filter((w) => !words2.includes(w));
    const only2 = words2.filter((w) => !words1.includes(w));

    if (only1.length === 1 && only2.length === 1) {
      const [w1] = only1;
      const [w2] = only2;
      if (w1.startsWith(w2.slice(0, STEM_PREFIX_LENGTH)) || w2.startsWith(w1.slice(0, STEM_PREFIX_LENGTH))) {
        return true;
      }
    }
  }

  return false;
}

// =============================================================================
// FILTERS
// =============================================================================

/**
 * Drop records without an id and repeated ids, keeping first-seen order
 */
export function dedupeById(records: SkillRecord[], seen: Set<string> = new Set()): SkillRecord[] {
  const unique: SkillRecord[] = [];
  for (const record of records) {
    if (!record.id || seen.has(record.id)) continue;
    seen.add(record.id);
    unique.push(record);
  }
  return unique;
}

/**
 * Stable filter: keep a candidate only if it is not similar to anything in
 * `accepted` or to a candidate kept before it.
 */
export function filterSimilarSkills(candidates: SkillRecord[], accepted: SkillRecord[] = []): SkillRecord[] {
  const kept: SkillRecord[] = [];
  for (const candidate of candidates) {
    const clashes = (existing: SkillRecord) => areSkillsSimilar(candidate.name, existing.name);
    if (accepted.some(clashes) || kept.some(clashes)) continue;
    kept.push(candidate);
  }
  return kept;
}
