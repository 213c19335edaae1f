/**
 * Test fixtures for the round-robin factorization
 *
 * Contains:
 * - Pair key helpers for set comparisons
 * - Perfect matching and complete coverage checks
 * - Scripted generators that break the factorization on purpose
 */

import type { Matching, MatchingGenerator, VertexIndex } from './types';

// ============================================================================
// Pair Keys
// ============================================================================

/** Order-independent key of an unordered pair */
export function pairKey(first: VertexIndex, second: VertexIndex): string {
  const low = Math.min(first, second);
  const high = Math.max(first, second);
  return `${low}-${high}`;
}

/** Keys of every pair across `matchings`, duplicates kept */
export function collectPairKeys(matchings: Iterable<Matching>): string[] {
  const keys: string[] = [];
  for (const matching of matchings) {
    for (const [first, second] of matching) {
      keys.push(pairKey(first, second));
    }
  }
  return keys;
}

/** Keys of all C(n, 2) pairs of [0, n), sorted */
export function allPairKeys(vertexCount: number): string[] {
  const keys: string[] = [];
  for (let first = 0; first < vertexCount; first++) {
    for (let second = first + 1; second < vertexCount; second++) {
      keys.push(pairKey(first, second));
    }
  }
  return keys.sort();
}

// ============================================================================
// Matching Checks
// ============================================================================

/** Whether `matching` covers [0, n) with each vertex exactly once */
export function isPerfectMatching(
  matching: Matching,
  vertexCount: number,
): boolean {
  const seen = new Set<VertexIndex>();
  for (const [first, second] of matching) {
    if (first === second || seen.has(first) || seen.has(second)) {
      return false;
    }
    seen.add(first);
    seen.add(second);
  }

  const coversAll = Array.from({ length: vertexCount }, (_, vertex) =>
    seen.has(vertex),
  ).every(Boolean);
  return coversAll && seen.size === vertexCount;
}

/** Even vertex counts in [min, max) */
export function evenVertexCounts(min: number, max: number): number[] {
  const counts: number[] = [];
  for (let count = min; count < max; count += 2) {
    counts.push(count);
  }
  return counts;
}

// ============================================================================
// Scripted Generators
// ============================================================================

/** Generator that ignores the vertex count and replays `matchings` */
export function scriptedGenerator(matchings: Matching[]): MatchingGenerator {
  return () => matchings;
}
