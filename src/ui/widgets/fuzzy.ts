/**
 * Fuzzy Matching
 *
 * Ranks candidates by how well a typed pattern matches them as an ordered,
 * case-insensitive subsequence. Matches at word starts and runs of adjacent
 * characters score higher; unmatched characters cost a point each.
 */

export interface FuzzyMatch {
  /** Matched candidate */
  str: string;
  /** Position of the candidate in the input list */
  index: number;
  score: number;
  /** Candidate character positions matched by the pattern */
  matchedIndexes: number[];
}

const FIRST_CHAR_MATCH_BONUS = 10;
const SEPARATOR_MATCH_BONUS = 20;
const CAMEL_CASE_MATCH_BONUS = 20;
const ADJACENT_MATCH_BONUS = 5;
const UNMATCHED_LEADING_CHAR_PENALTY = -5;
const MAX_UNMATCHED_LEADING_CHAR_PENALTY = -15;

const SEPARATORS = new Set(["/", "-", "_", " ", ".", "\\"]);

function isUpper(char: string): boolean {
  return char !== char.toLowerCase() && char === char.toUpperCase();
}

function isLower(char: string): boolean {
  return char !== char.toUpperCase() && char === char.toLowerCase();
}

/**
 * Score one candidate against a pattern.
 * Returns null when the pattern isn't a subsequence of the candidate.
 * An empty pattern matches nothing.
 */
export function fuzzyScore(pattern: string, candidate: string, index: number = 0): FuzzyMatch | null {
  if (pattern.length === 0) return null;

  const lowerPattern = pattern.toLowerCase();
  const lowerCandidate = candidate.toLowerCase();
  const matchedIndexes: number[] = [];

  let patternIdx = 0;
  let lastMatchIdx = -1;
  let score = 0;

  for (let i = 0; i < candidate.length && patternIdx < pattern.length; i++) {
    if (lowerCandidate.charAt(i) !== lowerPattern.charAt(patternIdx)) continue;

    if (i === 0) {
      score += FIRST_CHAR_MATCH_BONUS;
    } else {
      const prev = candidate.charAt(i - 1);
      if (SEPARATORS.has(prev)) {
        score += SEPARATOR_MATCH_BONUS;
      } else if (isLower(prev) && isUpper(candidate.charAt(i))) {
        score += CAMEL_CASE_MATCH_BONUS;
      }
    }

    if (lastMatchIdx >= 0 && i === lastMatchIdx + 1) {
      score += ADJACENT_MATCH_BONUS;
    }

    matchedIndexes.push(i);
    lastMatchIdx = i;
    patternIdx++;
  }

  if (patternIdx < pattern.length) return null;

  const leading = matchedIndexes[0] ?? 0;
  score += Math.max(leading * UNMATCHED_LEADING_CHAR_PENALTY, MAX_UNMATCHED_LEADING_CHAR_PENALTY);
  score -= candidate.length - matchedIndexes.length;

  return { str: candidate, index, score, matchedIndexes };
}

/**
 * Match a pattern against every candidate.
 * Sorted by descending score; equal scores keep candidate order.
 */
export function findMatches(pattern: string, candidates: readonly string[]): FuzzyMatch[] {
  const matches: FuzzyMatch[] = [];
  candidates.forEach((candidate, index) => {
    const match = fuzzyScore(pattern, candidate, index);
    if (match) matches.push(match);
  });

  matches.sort((a, b) => {
    const byScore = b.score - a.score;
    if (byScore !== 0) return byScore;
    return a.index - b.index;
  });
  return matches;
}
