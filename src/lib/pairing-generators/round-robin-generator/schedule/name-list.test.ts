import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll, describe, expect, test } from 'vitest';

import { SPACER } from '../constants';
import { NameListError } from '../errors';
import {
  buildVertexLabels,
  labelForVertex,
  parseNameList,
  readNameList,
} from './name-list';

describe('parseNameList', () => {
  test('one name per line, trimmed, blank lines dropped', () => {
    expect(parseNameList('Alice\n\n  Bob  \r\nCarol\n')).toEqual([
      'Alice',
      'Bob',
      'Carol',
    ]);
  });

  test('names keep their inner spaces', () => {
    expect(parseNameList('Ada Lovelace\nAlan Turing')).toEqual([
      'Ada Lovelace',
      'Alan Turing',
    ]);
  });

  test('blank text gives no names', () => {
    expect(parseNameList(' \n\t\n')).toEqual([]);
  });
});

describe('buildVertexLabels', () => {
  test('odd lists get a spacer', () => {
    expect(buildVertexLabels(['a', 'b', 'c'])).toEqual(['a', 'b', 'c', SPACER]);
  });

  test('even lists are copied unchanged', () => {
    const names = ['a', 'b'];
    const labels = buildVertexLabels(names);

    expect(labels).toEqual(['a', 'b']);
    expect(labels).not.toBe(names);
  });
});

describe('labelForVertex', () => {
  test('reads the label at the vertex', () => {
    expect(labelForVertex(['a', 'b'], 1)).toBe('b');
  });

  test('falls back to the spacer', () => {
    expect(labelForVertex(['a', 'b'], 5)).toBe(SPACER);
  });
});

describe('readNameList', () => {
  let directory = '';

  beforeAll(async () => {
    directory = await mkdtemp(join(tmpdir(), 'name-list-'));
  });

  afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  test('reads names from a file', async () => {
    const filePath = join(directory, 'names.txt');
    await writeFile(filePath, 'Alice\nBob\n\nCarol\n');

    await expect(readNameList(filePath)).resolves.toEqual([
      'Alice',
      'Bob',
      'Carol',
    ]);
  });

  test('missing file', async () => {
    const filePath = join(directory, 'missing.txt');

    await expect(readNameList(filePath)).rejects.toMatchObject({
      name: 'NameListError',
      reason: 'not-found',
      filePath,
    });
  });

  test('file of blank lines', async () => {
    const filePath = join(directory, 'blank.txt');
    await writeFile(filePath, '\n  \n\n');

    await expect(readNameList(filePath)).rejects.toMatchObject({
      reason: 'empty',
    });
  });

  test('a directory cannot be read as a list', async () => {
    await expect(readNameList(directory)).rejects.toBeInstanceOf(NameListError);
    await expect(readNameList(directory)).rejects.toMatchObject({
      reason: 'unreadable',
    });
  });
});
