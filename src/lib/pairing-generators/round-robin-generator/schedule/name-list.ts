/**
 * Participant names for a round-robin, one per vertex.
 */

import { readFile } from 'node:fs/promises';

import { SPACER } from '../constants';
import { NameListError } from '../errors';
import type { VertexIndex } from '../types';

/** Line breaks of any platform */
const LINE_BREAK_PATTERN = /\r?\n/;

/**
 * Splits newline-separated text into names, trimming each line and dropping
 * blank ones.
 */
export function parseNameList(text: string): string[] {
  return text
    .split(LINE_BREAK_PATTERN)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/** Narrows an unknown failure to a Node error carrying a `code` */
function hasErrorCode(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Reads the participant list from a UTF-8 file.
 *
 * @throws NameListError with reason 'not-found', 'unreadable' or 'empty'
 */
export async function readNameList(filePath: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf8');
  } catch (error) {
    const reason =
      hasErrorCode(error) && error.code === 'ENOENT' ? 'not-found' : 'unreadable';
    throw new NameListError(reason, filePath, { cause: error });
  }

  const names = parseNameList(text);
  if (names.length === 0) {
    throw new NameListError('empty', filePath);
  }

  return names;
}

/**
 * One label per vertex. An odd list gets a trailing {@link SPACER} so the
 * vertex count is even; its partner in each round sits out.
 */
export function buildVertexLabels(names: readonly string[]): string[] {
  const labels = [...names];
  if (labels.length % 2 !== 0) {
    labels.push(SPACER);
  }
  return labels;
}

/**
 * Label of `vertex`, or the {@link SPACER} when the vertex has none.
 */
export function labelForVertex(
  labels: readonly string[],
  vertex: VertexIndex,
): string {
  return labels[vertex] ?? SPACER;
}
