import { describe, expect, test } from 'vitest';

import { InvalidInputError } from './errors';
import {
  elementAtWrapped,
  greatestCommonDivisor,
  twoAdicValuation,
} from './number-theory';

const CIRCLE = ['a', 'b', 'c'] as const;

describe('twoAdicValuation', () => {
  test('odd numbers have valuation 0', () => {
    expect(twoAdicValuation(1)).toBe(0);
    expect(twoAdicValuation(15)).toBe(0);
  });

  test('counts factors of two', () => {
    expect(twoAdicValuation(2)).toBe(1);
    expect(twoAdicValuation(12)).toBe(2);
    expect(twoAdicValuation(96)).toBe(5);
    expect(twoAdicValuation(1024)).toBe(10);
  });

  test('ignores the sign', () => {
    expect(twoAdicValuation(-8)).toBe(3);
  });

  test('rejects zero', () => {
    expect(() => twoAdicValuation(0)).toThrow(InvalidInputError);
  });
});

describe('greatestCommonDivisor', () => {
  test('common cases', () => {
    expect(greatestCommonDivisor(12, 8)).toBe(4);
    expect(greatestCommonDivisor(8, 12)).toBe(4);
    expect(greatestCommonDivisor(9, 4)).toBe(1);
    expect(greatestCommonDivisor(18, 6)).toBe(6);
  });

  test('zero arguments', () => {
    expect(greatestCommonDivisor(7, 0)).toBe(7);
    expect(greatestCommonDivisor(0, 7)).toBe(7);
    expect(greatestCommonDivisor(0, 0)).toBe(0);
  });
});

describe('elementAtWrapped', () => {
  test('indices inside the list read directly', () => {
    expect(elementAtWrapped(CIRCLE, 0)).toBe('a');
    expect(elementAtWrapped(CIRCLE, 2)).toBe('c');
  });

  test('indices past the end wrap around', () => {
    expect(elementAtWrapped(CIRCLE, 3)).toBe('a');
    expect(elementAtWrapped(CIRCLE, 7)).toBe('b');
  });

  test('negative indices count back from the end', () => {
    expect(elementAtWrapped(CIRCLE, -1)).toBe('c');
    expect(elementAtWrapped(CIRCLE, -4)).toBe('c');
    expect(elementAtWrapped(CIRCLE, -3)).toBe('a');
  });

  test('empty list throws', () => {
    expect(() => elementAtWrapped([], 0)).toThrow(RangeError);
  });
});
