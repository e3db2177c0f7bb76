import { isSeparator } from './normalize';

export interface MatchScore {
  score: number;
  isMatch: boolean;
}

/** Longest input the subsequence tier accepts; longer names only match exactly or by substring. */
export const MAX_MATCH_LENGTH = 256;

// Score tiers. The substring length penalty is capped at MAX_MATCH_LENGTH - 1 characters, so
// substring scores stay within [SUBSTRING_BASE - 2 * 255, SUBSTRING_BASE + PREFIX_BONUS],
// strictly between FUZZY_CEILING and EXACT_SCORE.
export const EXACT_SCORE = 10000;
export const SUBSTRING_BASE = 5000;
export const PREFIX_BONUS = 2000;
export const BOUNDARY_BONUS = 1000;
export const SUBSTRING_LENGTH_PENALTY = 2;
export const FUZZY_CEILING = 4000;

const FUZZY_CHAR_SCORE = 100;
const FUZZY_RUN_BONUS = 50;
const FUZZY_BOUNDARY_BONUS = 200;
const FUZZY_LENGTH_PENALTY = 3;

const NO_MATCH: MatchScore = { score: 0, isMatch: false };

function lengthGap(text: string, pattern: string): number {
  return Math.min(text.length - pattern.length, MAX_MATCH_LENGTH - 1);
}

function substringBonus(text: string, pattern: string, firstIdx: number): number {
  if (firstIdx === 0) return PREFIX_BONUS;
  let idx = firstIdx;
  while (idx !== -1) {
    if (isSeparator(text[idx - 1])) return BOUNDARY_BONUS;
    idx = text.indexOf(pattern, idx + 1);
  }
  return 0;
}

function subsequenceScore(pattern: string, text: string): MatchScore {
  let score = 0;
  let textIdx = 0;
  let run = 0;
  let lastMatchIdx = -2;

  if (pattern.length > MAX_MATCH_LENGTH || text.length > MAX_MATCH_LENGTH) return NO_MATCH;

  for (let i = 0; i < pattern.length; i++) {
    let found = false;
    while (textIdx < text.length) {
      if (pattern[i] === text[textIdx]) {
        found = true;
        score += FUZZY_CHAR_SCORE;
        if (textIdx === lastMatchIdx + 1) {
          run++;
          score += run * FUZZY_RUN_BONUS;
        } else {
          run = 0;
        }
        if (textIdx === 0 || isSeparator(text[textIdx - 1])) score += FUZZY_BOUNDARY_BONUS;
        lastMatchIdx = textIdx;
        textIdx++;
        break;
      }
      textIdx++;
    }
    if (!found) return NO_MATCH;
  }

  score -= (text.length - pattern.length) * FUZZY_LENGTH_PENALTY;
  return { score: Math.min(score, FUZZY_CEILING), isMatch: true };
}

/**
 * fzf-style scoring of one name against a query. Exact matches outrank
 * substring matches, which outrank ordered-subsequence matches; scores are
 * only comparable within the same query.
 */
export function fuzzyMatch(query: string, name: string): MatchScore {
  const pattern = query.toLowerCase();
  const text = name.toLowerCase();

  if (pattern === '') return { score: 0, isMatch: true };
  if (pattern === text) return { score: EXACT_SCORE, isMatch: true };

  const idx = text.indexOf(pattern);
  if (idx !== -1) {
    const score =
      SUBSTRING_BASE +
      substringBonus(text, pattern, idx) -
      lengthGap(text, pattern) * SUBSTRING_LENGTH_PENALTY;
    return { score, isMatch: true };
  }

  return subsequenceScore(pattern, text);
}
