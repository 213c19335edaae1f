/**
 * Rotation matchings
 *
 * Covers the offsets the offset matchings skip. With r = 2^(v2(n) − 1) the
 * vertices split by residue mod r into r subgraphs of n / r vertices each,
 * and n / r is twice an odd number. Inside a subgraph laid out on a circle,
 * each step pairs one element with the element diametrically opposite and
 * every other element with its mirror image around that diameter. Rotating
 * the diameter through half the circle uses every edge of the subgraph once.
 *
 * All subgraphs rotate in lock-step; their matchings at the same step are
 * concatenated into one matching of the whole graph.
 */

import { elementAtWrapped } from './number-theory';
import type { Matching, VertexIndex, VertexPair } from './types';

/**
 * Yields the rotation matchings of a single circular list.
 *
 * @param elements - Even-length list, read circularly
 * @throws RangeError if the list length is odd
 */
export function* generateRotationRounds(
  elements: readonly VertexIndex[],
): Generator<Matching, void, undefined> {
  if (elements.length % 2 !== 0) {
    throw new RangeError(
      `Rotation needs an even number of elements, got ${elements.length}`,
    );
  }

  const halfLength = elements.length / 2;

  for (let rotation = 0; rotation < halfLength; rotation++) {
    const diameter: VertexPair = [
      elementAtWrapped(elements, rotation),
      elementAtWrapped(elements, rotation + halfLength),
    ];
    const pairs: VertexPair[] = [diameter];

    for (let distance = 1; distance < halfLength; distance++) {
      pairs.push([
        elementAtWrapped(elements, rotation + distance),
        elementAtWrapped(elements, rotation - distance),
      ]);
    }

    yield pairs;
  }
}

/**
 * Splits [0, n) into `subgraphCount` residue classes.
 *
 * Subgraph `s` is `s, s + r, s + 2r, …` below n.
 */
export function partitionByResidue(
  vertexCount: number,
  subgraphCount: number,
): VertexIndex[][] {
  const subgraphs: VertexIndex[][] = [];

  for (let residue = 0; residue < subgraphCount; residue++) {
    const subgraph: VertexIndex[] = [];
    for (let vertex = residue; vertex < vertexCount; vertex += subgraphCount) {
      subgraph.push(vertex);
    }
    subgraphs.push(subgraph);
  }

  return subgraphs;
}

/**
 * Yields the rotation matchings of the whole graph in increasing rotation
 * step, each the concatenation of every subgraph's matching at that step.
 *
 * @param vertexCount - Positive even vertex count n
 * @param subgraphCount - Half the largest power of two dividing n
 */
export function* generateRotationMatchings(
  vertexCount: number,
  subgraphCount: number,
): Generator<Matching, void, undefined> {
  const subgraphRounds = partitionByResidue(vertexCount, subgraphCount).map(
    (subgraph) => generateRotationRounds(subgraph),
  );

  // Subgraphs share a size, so they run out on the same step
  while (true) {
    const pairs: VertexPair[] = [];

    for (const rounds of subgraphRounds) {
      const next = rounds.next();
      if (next.done) {
        return;
      }
      pairs.push(...next.value);
    }

    yield pairs;
  }
}
