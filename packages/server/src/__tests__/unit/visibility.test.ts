import { describe, it, expect } from 'vitest';
import { resolveVisibility } from '../../services/visibility.js';

describe('resolveVisibility', () => {
  it.each([
    [true, undefined, 'open'],
    [true, true, 'open'],
    [true, false, 'open'],
    [false, true, 'open'],
    [false, false, 'requires_api_key'],
    [false, undefined, 'requires_api_key'],
  ] as const)('project public=%s, folder public=%s -> %s', (projectPublic, folderPublic, expected) => {
    const folder = folderPublic === undefined ? undefined : { isPublic: folderPublic };
    expect(resolveVisibility({ isPublic: projectPublic }, folder)).toBe(expected);
  });

  it('treats a null folder like no folder', () => {
    expect(resolveVisibility({ isPublic: false }, null)).toBe('requires_api_key');
  });
});
