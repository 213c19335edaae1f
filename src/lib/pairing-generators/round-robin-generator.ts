import * as z from 'zod';

import { InvalidInputError } from '@/lib/pairing-generators/round-robin-generator/errors';
import {
  IS_FACTORIZATION_DEBUG_ENABLED,
  factorizationLogger,
} from '@/lib/pairing-generators/round-robin-generator/factorization-logger';
import type { GenerationStartInfo } from '@/lib/pairing-generators/round-robin-generator/factorization-logger';
import { twoAdicValuation } from '@/lib/pairing-generators/round-robin-generator/number-theory';
import {
  countOffsetMatchings,
  generateOffsetMatchings,
} from '@/lib/pairing-generators/round-robin-generator/offset-matchings';
import { generateRotationMatchings } from '@/lib/pairing-generators/round-robin-generator/rotation-matchings';
import type { Matching } from '@/lib/pairing-generators/round-robin-generator/types';

/**
 * Vertex count accepted by the generator. Zero gets its own message: it is
 * even, but has no largest power of two to split on.
 */
export const vertexCountSchema = z
  .number({ invalid_type_error: 'The vertex count must be a number' })
  .int('The vertex count must be an integer')
  .refine((count) => count !== 0, {
    message: 'The vertex count cannot be zero',
  })
  .refine((count) => count > 0, {
    message: 'The vertex count must be positive',
  })
  .refine((count) => count % 2 === 0, {
    message: 'The vertex count must be even',
  });

/**
 * Checks that `vertexCount` is a positive even integer.
 *
 * @throws InvalidInputError carrying the first failed rule's message
 */
export function assertFactorableVertexCount(vertexCount: unknown): number {
  const parsed = vertexCountSchema.safeParse(vertexCount);

  if (!parsed.success) {
    const [firstIssue] = parsed.error.issues;
    throw new InvalidInputError(
      firstIssue?.message ?? 'Invalid vertex count',
      vertexCount,
    );
  }

  return parsed.data;
}

/**
 * Number of matchings in a factorization of the complete graph on
 * `vertexCount` vertices.
 */
export function countMatchings(vertexCount: number): number {
  return assertFactorableVertexCount(vertexCount) - 1;
}

/*
 * Produces the n − 1 perfect matchings of the complete graph on n vertices.
 * Every unordered pair of vertices appears in exactly one of them, so they
 * are the rounds of a round-robin where everyone meets everyone once.
 *
 * Offset matchings come first in increasing offset, then the rotation
 * matchings in increasing rotation step. The count is validated when this
 * is called; matchings are built as the result is iterated, and each
 * iteration starts over from the first matching.
 */
export function generateDisjointMatchings(
  vertexCount: number,
): Iterable<Matching> {
  const validCount = assertFactorableVertexCount(vertexCount);

  const valuation = twoAdicValuation(validCount);
  const twoFactorPower = 2 ** valuation;
  const subgraphCount = twoFactorPower / 2;

  if (IS_FACTORIZATION_DEBUG_ENABLED) {
    const startInfo: GenerationStartInfo = {
      vertexCount: validCount,
      twoAdicValuation: valuation,
      offsetMatchingCount: countOffsetMatchings(validCount, twoFactorPower),
      rotationMatchingCount: validCount / twoFactorPower,
      subgraphCount,
    };
    factorizationLogger
      .withMetadata(startInfo)
      .debug('Generating disjoint matchings');
  }

  return {
    *[Symbol.iterator]() {
      yield* generateOffsetMatchings(validCount, twoFactorPower);
      yield* generateRotationMatchings(validCount, subgraphCount);
    },
  };
}
