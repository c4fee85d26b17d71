import { describe, it, expect } from 'vitest';
import { isUuid, generateId, generateApiKey } from '../../crypto/random.js';

describe('isUuid', () => {
  it('accepts the ids and keys the service issues', () => {
    expect(isUuid(generateId())).toBe(true);
    expect(isUuid(generateApiKey())).toBe(true);
    expect(isUuid('0f8fad5b-d9cb-469f-a165-70867728950e')).toBe(true);
  });

  it('rejects anything else', () => {
    expect(isUuid('')).toBe(false);
    expect(isUuid('abc')).toBe(false);
    expect(isUuid('not-a-uuid')).toBe(false);
    expect(isUuid('0f8fad5b-d9cb-469f-a165-70867728950e-extra')).toBe(false);
    expect(isUuid("0f8fad5b' OR 1=1 --")).toBe(false);
  });
});
