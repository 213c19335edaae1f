import { describe, expect, test } from 'vitest';

import { loadCliConfig } from '@/lib/config/env';
import { InvalidInputError } from '@/lib/pairing-generators/round-robin-generator/errors';

describe('loadCliConfig', () => {
  test('defaults', () => {
    expect(loadCliConfig({})).toEqual({
      namesFile: 'names.txt',
      namePadding: 25,
      verifyMaxVertices: 100,
    });
  });

  test('reads and coerces variables', () => {
    expect(
      loadCliConfig({
        NAMES_FILE: 'club.txt',
        NAME_PADDING: '10',
        VERIFY_MAX_VERTICES: '40',
      }),
    ).toEqual({
      namesFile: 'club.txt',
      namePadding: 10,
      verifyMaxVertices: 40,
    });
  });

  test('names the variable that failed', () => {
    expect(() => loadCliConfig({ NAME_PADDING: '-1' })).toThrow(InvalidInputError);
    expect(() => loadCliConfig({ NAME_PADDING: '-1' })).toThrow(
      /^Invalid NAME_PADDING: /,
    );
    expect(() => loadCliConfig({ VERIFY_MAX_VERTICES: '1' })).toThrow(
      /^Invalid VERIFY_MAX_VERTICES: /,
    );
  });
});
