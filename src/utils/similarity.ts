/**
 * Fuzzy string similarity for team name matching.
 *
 * Scores are in [0, 1]; 1 means the normalized strings are identical.
 */

import { normalizeText } from './index.js';

// A name whose words all appear in the other, e.g. "Golden State" in "Golden State Warriors"
const TOKEN_SUBSET_SCORE = 0.95;

// Partial matches are discounted by how much of the longer string they cover
const PARTIAL_BASE = 0.6;
const PARTIAL_COVERAGE = 0.3;

/**
 * Lowercase, strip punctuation, collapse whitespace.
 */
export function normalizeName(text: string): string {
  return normalizeText(text.replace(/[^\p{L}\p{N}\s]/gu, ' '));
}

/**
 * Classic two-row Levenshtein edit distance.
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current[j] = Math.min(
        previous[j] + 1,
        current[j - 1] + 1,
        previous[j - 1] + cost
      );
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * 1 - distance / longer length.
 */
export function ratio(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  if (longest === 0) return 0;
  return 1 - levenshtein(a, b) / longest;
}

/**
 * Best ratio of the shorter string against every same-length window of the longer.
 */
export function partialRatio(a: string, b: string): number {
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (shorter.length < 2) return 0;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) best = score;
    if (best === 1) break;
  }
  return best;
}

function tokens(text: string): string[] {
  return text.split(' ').filter(Boolean);
}

function tokenSort(text: string): string {
  return tokens(text).sort().join(' ');
}

function isTokenSubset(a: string, b: string): boolean {
  const left = new Set(tokens(a));
  const right = new Set(tokens(b));
  const [smaller, larger] = left.size <= right.size ? [left, right] : [right, left];
  if (smaller.size === 0) return false;
  return [...smaller].every(token => larger.has(token));
}

function partialWeight(a: string, b: string): number {
  const coverage = Math.min(a.length, b.length) / Math.max(a.length, b.length);
  return PARTIAL_BASE + PARTIAL_COVERAGE * coverage;
}

/**
 * Combined similarity of two free-text names.
 */
export function similarity(a: string, b: string): number {
  const left = normalizeName(a);
  const right = normalizeName(b);
  if (!left || !right) return 0;
  if (left === right) return 1;

  return Math.max(
    ratio(left, right),
    ratio(tokenSort(left), tokenSort(right)),
    isTokenSubset(left, right) ? TOKEN_SUBSET_SCORE : 0,
    partialWeight(left, right) * partialRatio(left, right)
  );
}

export interface BestMatch {
  candidate: string;
  score: number;
}

/**
 * Highest-scoring candidate; the earliest one wins a tie.
 */
export function extractOne(query: string, candidates: readonly string[]): BestMatch | null {
  let best: BestMatch | null = null;

  for (const candidate of candidates) {
    const score = similarity(query, candidate);
    if (!best || score > best.score) {
      best = { candidate, score };
    }
  }

  return best;
}
