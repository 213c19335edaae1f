/**
 * Factorization verifier
 *
 * Replays a factorization into an undirected graph and checks the defining
 * property: each matching is perfect, no pair appears twice, and at the end
 * every vertex is adjacent to all n − 1 others.
 */

import { UndirectedGraph } from 'graphology';

import { generateDisjointMatchings } from '@/lib/pairing-generators/round-robin-generator';
import {
  DEFAULT_VERIFY_MAX_VERTICES,
  MIN_VERTEX_COUNT,
  VERTEX_COUNT_STEP,
} from './constants';
import {
  DuplicatePairError,
  ImperfectMatchingError,
  IncompleteCoverageError,
  InvalidInputError,
  InvalidPairError,
  RoundRobinError,
} from './errors';
import {
  IS_FACTORIZATION_DEBUG_ENABLED,
  factorizationLogger,
} from './factorization-logger';
import type { VerificationInfo, VerificationRangeInfo } from './factorization-logger';
import type {
  Matching,
  MatchingGenerator,
  VerificationOutcome,
  VerificationReport,
  VertexIndex,
} from './types';

// ============================================================================
// Types
// ============================================================================

/** Options for {@link verifyRange} */
export interface VerifyRangeOptions {
  /** Generator under test, defaults to {@link generateDisjointMatchings} */
  readonly generate?: MatchingGenerator;

  /** Called once per vertex count, in increasing order */
  readonly onProgress?: (outcome: VerificationOutcome) => void;
}

/** Bounds as typed on the command line, either of which may be missing */
export interface VerificationRangeArgs {
  readonly min?: number;
  readonly max?: number;
}

// ============================================================================
// Single Vertex Count
// ============================================================================

/** Order-independent key of an unordered pair */
function toPairKey(first: VertexIndex, second: VertexIndex): string {
  return first < second ? `${first}-${second}` : `${second}-${first}`;
}

/**
 * Checks that a matching covers [0, n) with each vertex exactly once.
 *
 * A pair listed twice in the same matching is a duplicate pair rather than
 * a repeated vertex.
 */
function assertPerfectMatching(
  matching: Matching,
  matchingIndex: number,
  vertexCount: number,
): void {
  const seen = new Set<VertexIndex>();
  const seenPairs = new Set<string>();

  for (const [first, second] of matching) {
    const isInRange =
      Number.isInteger(first) &&
      Number.isInteger(second) &&
      first >= 0 &&
      second >= 0 &&
      first < vertexCount &&
      second < vertexCount;

    if (!isInRange || first === second) {
      throw new InvalidPairError(first, second, vertexCount);
    }

    const pairKey = toPairKey(first, second);
    if (seenPairs.has(pairKey)) {
      throw new DuplicatePairError(first, second);
    }
    seenPairs.add(pairKey);

    for (const vertex of [first, second]) {
      if (seen.has(vertex)) {
        throw new ImperfectMatchingError(matchingIndex, vertex, 'repeated');
      }
      seen.add(vertex);
    }
  }

  for (let vertex = 0; vertex < vertexCount; vertex++) {
    if (!seen.has(vertex)) {
      throw new ImperfectMatchingError(matchingIndex, vertex, 'omitted');
    }
  }
}

/**
 * Verifies the factorization for one vertex count.
 *
 * @param vertexCount - Positive even vertex count
 * @param generate - Generator under test
 * @returns Number of matchings consumed
 * @throws InvalidInputError if the vertex count is rejected by the generator
 * @throws DuplicatePairError if a pair is emitted twice
 * @throws IncompleteCoverageError if a vertex misses a neighbour
 * @throws InvalidPairError or ImperfectMatchingError for a malformed matching
 */
export function verifyFactorization(
  vertexCount: number,
  generate: MatchingGenerator = generateDisjointMatchings,
): number {
  const matchings = generate(vertexCount);
  const adjacency = new UndirectedGraph({ allowSelfLoops: false });

  for (let vertex = 0; vertex < vertexCount; vertex++) {
    adjacency.addNode(vertex);
  }

  let matchingCount = 0;
  for (const matching of matchings) {
    assertPerfectMatching(matching, matchingCount, vertexCount);

    for (const [first, second] of matching) {
      // Undirected: also catches the reversed pair
      if (adjacency.hasEdge(first, second)) {
        throw new DuplicatePairError(first, second);
      }
      adjacency.addEdge(first, second);
    }

    matchingCount++;
  }

  const expectedNeighbourCount = vertexCount - 1;
  for (let vertex = 0; vertex < vertexCount; vertex++) {
    const neighbourCount = adjacency.degree(vertex);
    if (neighbourCount !== expectedNeighbourCount) {
      throw new IncompleteCoverageError(
        vertex,
        neighbourCount,
        expectedNeighbourCount,
      );
    }
  }

  if (IS_FACTORIZATION_DEBUG_ENABLED) {
    const verificationInfo: VerificationInfo = {
      vertexCount,
      matchingCount,
      pairCount: adjacency.size,
    };
    factorizationLogger
      .withMetadata(verificationInfo)
      .debug('Factorization verified');
  }

  return matchingCount;
}

// ============================================================================
// Vertex Count Ranges
// ============================================================================

/**
 * Turns command-line bounds into a half-open range.
 *
 * No bounds checks [2, 100); a single bound is the exclusive maximum;
 * two bounds are taken as given.
 */
export function resolveVerificationRange(
  args: VerificationRangeArgs,
  defaultMax: number = DEFAULT_VERIFY_MAX_VERTICES,
): { minVertexCount: number; maxVertexCount: number } {
  if (args.min === undefined && args.max === undefined) {
    return { minVertexCount: MIN_VERTEX_COUNT, maxVertexCount: defaultMax };
  }
  if (args.min === undefined || args.max === undefined) {
    const onlyBound = args.min ?? args.max ?? defaultMax;
    return { minVertexCount: MIN_VERTEX_COUNT, maxVertexCount: onlyBound };
  }
  return { minVertexCount: args.min, maxVertexCount: args.max };
}

/**
 * Verifies every even vertex count in [min, max).
 *
 * An odd `min` is rounded up. A failing vertex count is recorded in the
 * report and the scan moves on to the next one; errors that are not
 * {@link RoundRobinError}s propagate.
 *
 * @throws InvalidInputError if a bound is not an integer or `min` is below 2
 */
export function verifyRange(
  minVertexCount: number,
  maxVertexCount: number,
  options: VerifyRangeOptions = {},
): VerificationReport {
  if (!Number.isInteger(minVertexCount) || !Number.isInteger(maxVertexCount)) {
    throw new InvalidInputError('Verification bounds must be integers', {
      minVertexCount,
      maxVertexCount,
    });
  }
  if (minVertexCount < MIN_VERTEX_COUNT) {
    throw new InvalidInputError(
      `Verification must start at ${MIN_VERTEX_COUNT} vertices or more`,
      minVertexCount,
    );
  }

  const generate = options.generate ?? generateDisjointMatchings;
  const firstVertexCount =
    minVertexCount % VERTEX_COUNT_STEP === 0 ? minVertexCount : minVertexCount + 1;
  const outcomes: VerificationOutcome[] = [];

  for (
    let vertexCount = firstVertexCount;
    vertexCount < maxVertexCount;
    vertexCount += VERTEX_COUNT_STEP
  ) {
    const outcome = verifyOne(vertexCount, generate);
    outcomes.push(outcome);
    options.onProgress?.(outcome);
  }

  const failedVertexCounts = outcomes
    .filter((outcome) => !outcome.passed)
    .map((outcome) => outcome.vertexCount);

  if (failedVertexCounts.length > 0) {
    const rangeInfo: VerificationRangeInfo = {
      minVertexCount: firstVertexCount,
      maxVertexCount,
      failedVertexCounts,
    };
    factorizationLogger
      .withMetadata(rangeInfo)
      .warn('Verification found failing vertex counts');
  }

  return {
    minVertexCount: firstVertexCount,
    maxVertexCount,
    outcomes,
    passed: failedVertexCounts.length === 0,
  };
}

/**
 * Runs {@link verifyFactorization} and folds a package error into a failed
 * outcome.
 */
function verifyOne(
  vertexCount: number,
  generate: MatchingGenerator,
): VerificationOutcome {
  // Counts matchings as they stream past, so a failure reports how far it got
  let matchingCount = 0;
  const countingGenerate: MatchingGenerator = (count) => {
    const matchings = generate(count);
    return {
      *[Symbol.iterator]() {
        for (const matching of matchings) {
          matchingCount++;
          yield matching;
        }
      },
    };
  };

  try {
    verifyFactorization(vertexCount, countingGenerate);
    return { vertexCount, matchingCount, passed: true };
  } catch (error) {
    if (!(error instanceof RoundRobinError)) {
      throw error;
    }

    factorizationLogger
      .withError(error)
      .withMetadata({ vertexCount, matchingCount })
      .error('Factorization failed verification');
    return { vertexCount, matchingCount, passed: false, error };
  }
}
