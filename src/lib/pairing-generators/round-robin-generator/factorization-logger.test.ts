import { describe, expect, test } from 'vitest';

import { isDebugRequested } from './factorization-logger';

describe('isDebugRequested', () => {
  test('DEBUG naming the factorization logs', () => {
    expect(isDebugRequested({ DEBUG: 'factorization' })).toBe(true);
    expect(isDebugRequested({ DEBUG: 'http,factorization' })).toBe(true);
  });

  test('LOG_LEVEL=debug', () => {
    expect(isDebugRequested({ LOG_LEVEL: 'debug' })).toBe(true);
  });

  test('off otherwise', () => {
    expect(isDebugRequested({})).toBe(false);
    expect(isDebugRequested({ DEBUG: 'http' })).toBe(false);
    expect(isDebugRequested({ LOG_LEVEL: 'info' })).toBe(false);
  });
});
