/**
 * Offset matchings
 *
 * Place the n vertices on a circle. Stepping by a fixed offset `i` splits the
 * circle into gcd(n, i) cycles of length n / gcd(n, i). When that length is
 * even, every other edge of each cycle forms a perfect matching of the
 * cycle, and together the cycles give a perfect matching of all n vertices.
 * For gcd(n, i) = 1 there is a single Hamiltonian cycle.
 *
 * Offsets whose cycles would be odd (multiples of the full power of two in
 * n) and the diameter offset n/2 are left to the rotation matchings.
 */

import { greatestCommonDivisor } from './number-theory';
import type { Matching, VertexPair } from './types';

/** Alternate edges of a cycle: take one, skip one */
const EDGE_STRIDE = 2;

/**
 * Whether offset `i` is handled by the rotation matchings instead.
 *
 * @param offset - Offset in [1, n)
 * @param vertexCount - Even vertex count n
 * @param twoFactorPower - Largest power of two dividing n
 */
export function isRotationOffset(
  offset: number,
  vertexCount: number,
  twoFactorPower: number,
): boolean {
  const isMultipleOfTwoFactorPower = offset % twoFactorPower === 0;
  const isDiameter = offset === vertexCount / 2;
  return isMultipleOfTwoFactorPower || isDiameter;
}

/**
 * Builds the matching for one offset by walking each residue cycle and
 * taking alternate edges.
 *
 * @param vertexCount - Even vertex count n
 * @param offset - Offset `i` whose cycles all have even length
 * @returns Pairs ordered by residue, then by position along the cycle
 */
export function buildOffsetMatching(
  vertexCount: number,
  offset: number,
): Matching {
  const cycleCount = greatestCommonDivisor(vertexCount, offset);
  const cycleLength = vertexCount / cycleCount;
  const pairs: VertexPair[] = [];

  for (let residue = 0; residue < cycleCount; residue++) {
    for (let step = 0; step < cycleLength; step += EDGE_STRIDE) {
      const first = (residue + step * offset) % vertexCount;
      const second = (residue + (step + 1) * offset) % vertexCount;
      pairs.push([first, second]);
    }
  }

  return pairs;
}

/**
 * Yields the offset matchings in increasing order of offset.
 *
 * @param vertexCount - Positive even vertex count n
 * @param twoFactorPower - Largest power of two dividing n
 */
export function* generateOffsetMatchings(
  vertexCount: number,
  twoFactorPower: number,
): Generator<Matching, void, undefined> {
  for (let offset = 1; offset < vertexCount; offset++) {
    if (isRotationOffset(offset, vertexCount, twoFactorPower)) {
      continue;
    }
    yield buildOffsetMatching(vertexCount, offset);
  }
}

/**
 * Number of matchings {@link generateOffsetMatchings} yields for n:
 * n − 1 offsets, less the multiples of the two-factor power, less n/2.
 */
export function countOffsetMatchings(
  vertexCount: number,
  twoFactorPower: number,
): number {
  const multiplesBelowN = vertexCount / twoFactorPower - 1;
  return vertexCount - 1 - multiplesBelowN - 1;
}
