/**
 * Integer helpers behind the factorization: 2-adic valuation, gcd and
 * wrap-around indexing.
 */

import { InvalidInputError } from './errors';

/** Radix of the valuation computed below */
const TWO = 2;

/**
 * Counts how many times `value` divides by two before becoming odd.
 *
 * @param value - Non-zero integer
 * @returns Exponent of the largest power of two dividing `value`
 * @throws InvalidInputError if `value` is zero (every power of two divides it)
 */
export function twoAdicValuation(value: number): number {
  if (value === 0) {
    throw new InvalidInputError(
      'Cannot take the 2-adic valuation of zero',
      value,
    );
  }

  let remaining = Math.abs(value);
  let valuation = 0;
  while (remaining % TWO === 0) {
    remaining /= TWO;
    valuation++;
  }

  return valuation;
}

/**
 * Euclid's algorithm on non-negative integers.
 *
 * `greatestCommonDivisor(n, 0)` is `n`, as usual.
 */
export function greatestCommonDivisor(first: number, second: number): number {
  let a = Math.abs(first);
  let b = Math.abs(second);

  while (b !== 0) {
    const remainder = a % b;
    a = b;
    b = remainder;
  }

  return a;
}

/**
 * Reads `elements` as a circular list: any integer index, negative or past
 * the end, is reduced modulo the length first.
 *
 * @param elements - Non-empty list
 * @param index - Any integer
 * @returns Element at `index mod elements.length`
 * @throws RangeError if `elements` is empty
 */
export function elementAtWrapped<T>(elements: readonly T[], index: number): T {
  const length = elements.length;
  if (length === 0) {
    throw new RangeError('Cannot index into an empty circular list');
  }

  // JS `%` keeps the dividend's sign, so shift negatives back into range
  const wrappedIndex = ((index % length) + length) % length;
  return elements[wrappedIndex];
}
