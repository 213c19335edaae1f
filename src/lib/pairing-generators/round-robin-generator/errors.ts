/**
 * Error taxonomy for the round-robin factorization.
 *
 * Input errors are raised before any matching is produced and are never
 * retried. Invariant errors are raised only by the verifier and mean the
 * generator is wrong for that vertex count.
 */

import type { VertexIndex } from './types';

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base class for every error this package raises, so callers can separate
 * them from unrelated failures with a single `instanceof` check.
 */
export class RoundRobinError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

// ============================================================================
// Input Validation
// ============================================================================

/**
 * Vertex count (or verification range) cannot be factorized.
 */
export class InvalidInputError extends RoundRobinError {
  /** The rejected value */
  readonly input: unknown;

  constructor(message: string, input: unknown) {
    super(message);
    this.input = input;
  }
}

// ============================================================================
// Invariant Violations (verifier only)
// ============================================================================

/**
 * The same unordered pair was emitted twice across the factorization.
 */
export class DuplicatePairError extends RoundRobinError {
  readonly first: VertexIndex;
  readonly second: VertexIndex;

  constructor(first: VertexIndex, second: VertexIndex) {
    super(`Pair (${first}, ${second}) was emitted more than once`);
    this.first = first;
    this.second = second;
  }
}

/**
 * A vertex ended the factorization without meeting every other vertex.
 */
export class IncompleteCoverageError extends RoundRobinError {
  readonly vertex: VertexIndex;
  readonly neighbourCount: number;
  readonly expectedCount: number;

  constructor(vertex: VertexIndex, neighbourCount: number, expectedCount: number) {
    super(
      `Vertex ${vertex} has only ${neighbourCount} edges, expected ${expectedCount}`,
    );
    this.vertex = vertex;
    this.neighbourCount = neighbourCount;
    this.expectedCount = expectedCount;
  }
}

/**
 * A pair joins a vertex to itself or names a vertex outside [0, n).
 */
export class InvalidPairError extends RoundRobinError {
  readonly first: VertexIndex;
  readonly second: VertexIndex;
  readonly vertexCount: number;

  constructor(first: VertexIndex, second: VertexIndex, vertexCount: number) {
    super(
      `Pair (${first}, ${second}) is not an edge of the complete graph on ${vertexCount} vertices`,
    );
    this.first = first;
    this.second = second;
    this.vertexCount = vertexCount;
  }
}

/**
 * A matching repeats or omits a vertex.
 */
export class ImperfectMatchingError extends RoundRobinError {
  /** Position of the matching in the factorization (0-indexed) */
  readonly matchingIndex: number;
  readonly vertex: VertexIndex;

  constructor(matchingIndex: number, vertex: VertexIndex, reason: 'repeated' | 'omitted') {
    super(`Matching ${matchingIndex + 1} is not perfect: vertex ${vertex} is ${reason}`);
    this.matchingIndex = matchingIndex;
    this.vertex = vertex;
  }
}

// ============================================================================
// Name List
// ============================================================================

/** Why a participant list could not be used */
export type NameListFailure = 'not-found' | 'unreadable' | 'empty';

/**
 * The participant list could not be loaded.
 */
export class NameListError extends RoundRobinError {
  readonly reason: NameListFailure;
  readonly filePath: string;

  constructor(reason: NameListFailure, filePath: string, options?: ErrorOptions) {
    super(NameListError.describe(reason, filePath), options);
    this.reason = reason;
    this.filePath = filePath;
  }

  private static describe(reason: NameListFailure, filePath: string): string {
    switch (reason) {
      case 'not-found':
        return `Could not find the names file '${filePath}'`;
      case 'unreadable':
        return `The names file '${filePath}' exists but could not be read`;
      case 'empty':
        return `The names file '${filePath}' contains only blank lines`;
    }
  }
}
