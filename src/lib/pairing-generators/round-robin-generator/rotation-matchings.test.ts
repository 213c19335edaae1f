import { describe, expect, test } from 'vitest';

import {
  generateRotationMatchings,
  generateRotationRounds,
  partitionByResidue,
} from './rotation-matchings';

describe('generateRotationRounds', () => {
  test('two elements give a single diameter', () => {
    expect(Array.from(generateRotationRounds([10, 20]))).toEqual([[[10, 20]]]);
  });

  test('six elements rotate the diameter through half the circle', () => {
    expect(Array.from(generateRotationRounds([0, 1, 2, 3, 4, 5]))).toEqual([
      [
        [0, 3],
        [1, 5],
        [2, 4],
      ],
      [
        [1, 4],
        [2, 0],
        [3, 5],
      ],
      [
        [2, 5],
        [3, 1],
        [4, 0],
      ],
    ]);
  });

  test('works on arbitrary labels', () => {
    const [firstRound] = Array.from(generateRotationRounds([7, 9, 11, 13]));
    expect(firstRound).toEqual([
      [7, 11],
      [9, 13],
    ]);
  });

  test('odd length throws', () => {
    expect(() => Array.from(generateRotationRounds([1, 2, 3]))).toThrow(
      RangeError,
    );
  });
});

describe('partitionByResidue', () => {
  test('one subgraph holds every vertex', () => {
    expect(partitionByResidue(6, 1)).toEqual([[0, 1, 2, 3, 4, 5]]);
  });

  test('splits by residue', () => {
    expect(partitionByResidue(8, 4)).toEqual([
      [0, 4],
      [1, 5],
      [2, 6],
      [3, 7],
    ]);
    expect(partitionByResidue(12, 2)).toEqual([
      [0, 2, 4, 6, 8, 10],
      [1, 3, 5, 7, 9, 11],
    ]);
  });
});

describe('generateRotationMatchings', () => {
  test('concatenates subgraph rounds in lock-step', () => {
    const matchings = Array.from(generateRotationMatchings(12, 2));

    expect(matchings).toHaveLength(3);
    expect(matchings[0]).toEqual([
      [0, 6],
      [2, 10],
      [4, 8],
      [1, 7],
      [3, 11],
      [5, 9],
    ]);
  });

  test('power-of-two vertex counts give one matching of opposite pairs', () => {
    expect(Array.from(generateRotationMatchings(8, 4))).toEqual([
      [
        [0, 4],
        [1, 5],
        [2, 6],
        [3, 7],
      ],
    ]);
  });
});
