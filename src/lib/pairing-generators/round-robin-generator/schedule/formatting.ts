import { DEFAULT_NAME_PADDING, PAIR_SEPARATOR } from '../constants';
import type { Matching } from '../types';
import { labelForVertex } from './name-list';

/** Space used to right-align names */
const PADDING_CHARACTER = ' ';

/**
 * Left-pads `name` to `width` code points, so characters outside the basic
 * plane count once.
 */
export function padNameStart(name: string, width: number): string {
  const length = Array.from(name).length;
  return length >= width ? name : PADDING_CHARACTER.repeat(width - length) + name;
}

/**
 * Renders each pair of a matching on its own line, the first name
 * right-aligned to `padding` columns.
 */
export function formatMatching(
  matching: Matching,
  labels: readonly string[],
  padding: number = DEFAULT_NAME_PADDING,
): string[] {
  return matching.map(([first, second]) => {
    const firstName = padNameStart(labelForVertex(labels, first), padding);
    const secondName = labelForVertex(labels, second);
    return `${firstName}${PAIR_SEPARATOR}${secondName}`;
  });
}

/**
 * {@link formatMatching} under a `Matching <n>:` heading, counting rounds
 * from 1.
 */
export function formatRound(
  roundIndex: number,
  matching: Matching,
  labels: readonly string[],
  padding: number = DEFAULT_NAME_PADDING,
): string[] {
  return [`Matching ${roundIndex + 1}:`, ...formatMatching(matching, labels, padding)];
}
