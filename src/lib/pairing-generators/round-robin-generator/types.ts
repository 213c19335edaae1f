/**
 * Types for the round-robin factorization.
 *
 * Vertices are plain indices; display names live in a separate label list
 * owned by the schedule collaborators.
 */

import type { RoundRobinError } from './errors';

// ============================================================================
// Graph Types
// ============================================================================

/** Vertex of the complete graph, an integer in [0, n) */
export type VertexIndex = number;

/** Unordered pair of distinct vertices */
export type VertexPair = readonly [VertexIndex, VertexIndex];

/** Perfect matching: n/2 disjoint pairs covering every vertex once */
export type Matching = readonly VertexPair[];

/** Produces the matchings of a factorization for a vertex count */
export type MatchingGenerator = (vertexCount: number) => Iterable<Matching>;

// ============================================================================
// Verification Types
// ============================================================================

/**
 * Result of verifying a single vertex count.
 *
 * @property vertexCount - Number of vertices checked
 * @property matchingCount - Matchings consumed before finishing or failing
 */
export type VerificationOutcome =
  | {
      readonly vertexCount: number;
      readonly matchingCount: number;
      readonly passed: true;
    }
  | {
      readonly vertexCount: number;
      readonly matchingCount: number;
      readonly passed: false;
      readonly error: RoundRobinError;
    };

/**
 * Result of verifying every even vertex count in [min, max).
 */
export interface VerificationReport {
  /** Inclusive lower bound actually used (rounded up to even) */
  readonly minVertexCount: number;

  /** Exclusive upper bound */
  readonly maxVertexCount: number;

  /** One outcome per vertex count, in increasing order */
  readonly outcomes: readonly VerificationOutcome[];

  /** Whether every vertex count passed */
  readonly passed: boolean;
}
