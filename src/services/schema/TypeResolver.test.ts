import { describe, expect, it } from 'vitest';
import { resolveTypeToken } from './TypeResolver.js';

describe('resolveTypeToken', () => {
  it('resolves the recognized tokens', () => {
    expect(resolveTypeToken('int')).toBe('integer');
    expect(resolveTypeToken('float')).toBe('float');
    expect(resolveTypeToken('list')).toBe('list');
    expect(resolveTypeToken('str')).toBe('text');
  });

  it('ignores case and surrounding whitespace', () => {
    expect(resolveTypeToken('INT')).toBe('integer');
    expect(resolveTypeToken(' Float ')).toBe('float');
  });

  it('falls back to text for unknown tokens', () => {
    expect(resolveTypeToken('date')).toBe('text');
    expect(resolveTypeToken('')).toBe('text');
    expect(resolveTypeToken('constructor')).toBe('text');
  });
});
