import { describe, it, expect } from 'vitest';
import { maskSecret, readSecret } from './api-keys.js';

describe('readSecret', () => {
  it('strips surrounding quotes and whitespace', () => {
    expect(readSecret({ KEY: "  'test-secret'\n" }, 'KEY')).toBe('test-secret');
  });

  it('returns undefined for unset or empty values', () => {
    expect(readSecret({}, 'KEY')).toBeUndefined();
    expect(readSecret({ KEY: '""' }, 'KEY')).toBeUndefined();
  });
});

describe('maskSecret', () => {
  it('keeps only the last four characters', () => {
    expect(maskSecret('test-secret')).toBe('****cret');
    expect(maskSecret('abc')).toBe('****');
  });
});
