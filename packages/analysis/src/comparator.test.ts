import { describe, it, expect } from 'vitest';
import { ABSENT, ValidationError, present } from '@tempo-consensus/core';
import { agree, compareReadings } from './comparator.js';

const SAMPLE_BPMS = [49.7, 60, 70, 88.2, 99.4, 100, 105, 120, 140, 176.4, 198.8, 200, 240];

describe('agree', () => {
  it('is reflexive', () => {
    for (const bpm of SAMPLE_BPMS) {
      expect(agree(bpm, bpm)).toBe(true);
    }
  });

  it('is symmetric', () => {
    for (const a of SAMPLE_BPMS) {
      for (const b of SAMPLE_BPMS) {
        expect(agree(a, b)).toBe(agree(b, a));
      }
    }
  });

  it('treats half and double time as the same tempo', () => {
    expect(agree(99.4, 198.8)).toBe(true);
    expect(agree(198.8, 99.4)).toBe(true);
    expect(agree(70, 140)).toBe(true);
    expect(agree(120, 60)).toBe(true);
  });

  it('applies the tolerance to octave-shifted values', () => {
    expect(agree(100, 203)).toBe(true);
    expect(agree(100, 211)).toBe(false);
    expect(agree(100, 47)).toBe(true);
  });

  it('includes the tolerance boundary', () => {
    expect(agree(100, 105)).toBe(true);
    expect(agree(100, 106)).toBe(false);
  });

  it('rejects unrelated tempos', () => {
    expect(agree(100, 150)).toBe(false);
    expect(agree(100, 130)).toBe(false);
  });

  it('honours a custom tolerance', () => {
    expect(agree(100, 108, 10)).toBe(true);
    expect(agree(100, 100.5, 0)).toBe(false);
    expect(agree(100, 200, 0)).toBe(true);
  });

  it('rejects a negative tolerance', () => {
    expect(() => agree(100, 100, -1)).toThrow(ValidationError);
  });
});

describe('compareReadings', () => {
  it('excludes pairs with an absent side', () => {
    expect(compareReadings(present(100), ABSENT)).toBeNull();
    expect(compareReadings(ABSENT, present(100))).toBeNull();
    expect(compareReadings(ABSENT, ABSENT)).toBeNull();
  });

  it('compares present readings', () => {
    expect(compareReadings(present(99), present(198))).toBe(true);
    expect(compareReadings(present(99), present(150))).toBe(false);
  });
});
