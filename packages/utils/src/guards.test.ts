import { describe, it, expect } from 'vitest';
import { isNonEmptyString, isNumber, isObject, isPositiveFinite } from './guards.js';

describe('guards', () => {
  it('rejects NaN as a number', () => {
    expect(isNumber(NaN)).toBe(false);
    expect(isNumber(0)).toBe(true);
  });

  it('treats arrays and null as non-objects', () => {
    expect(isObject([])).toBe(false);
    expect(isObject(null)).toBe(false);
    expect(isObject({ file: 'a.mp3' })).toBe(true);
  });

  it('requires visible characters for non-empty strings', () => {
    expect(isNonEmptyString('  ')).toBe(false);
    expect(isNonEmptyString('essentia')).toBe(true);
  });

  describe('isPositiveFinite', () => {
    it.each([0, -1, Infinity, NaN, '120'])('rejects %s', (value) => {
      expect(isPositiveFinite(value)).toBe(false);
    });

    it('accepts a fractional tempo', () => {
      expect(isPositiveFinite(99.4)).toBe(true);
    });
  });
});
