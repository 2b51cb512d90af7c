/**
 * Octave-Aware Comparator
 *
 * Onset-based tempo detectors routinely lock onto half or double the felt
 * pulse, so 99 and 198 BPM describe the same tune.
 *
 * Two values agree when any of these is within tolerance:
 *   |a - b|, |a - 2b|, |2a - b|, |a - b/2|, |a/2 - b|
 * The set is closed under swapping a and b, so agree() is symmetric.
 */

import {
  DEFAULT_TOLERANCE_BPM,
  ValidationError,
  isPresent,
  type BpmReading,
} from '@tempo-consensus/core';

function assertTolerance(tolerance: number): void {
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new ValidationError('toleranceBpm', `must be a finite number >= 0, got ${tolerance}`);
  }
}

/**
 * Whether two BPM values describe the same tempo
 */
export function agree(a: number, b: number, tolerance: number = DEFAULT_TOLERANCE_BPM): boolean {
  assertTolerance(tolerance);

  const within = (x: number, y: number): boolean => Math.abs(x - y) <= tolerance;

  return (
    within(a, b) ||
    within(a, b * 2) ||
    within(a * 2, b) ||
    within(a, b / 2) ||
    within(a / 2, b)
  );
}

/**
 * agree() lifted to readings.
 * Returns null when either side is absent: the pair is not compared at all.
 */
export function compareReadings(
  a: BpmReading,
  b: BpmReading,
  tolerance: number = DEFAULT_TOLERANCE_BPM
): boolean | null {
  if (!isPresent(a) || !isPresent(b)) {
    return null;
  }
  return agree(a.bpm, b.bpm, tolerance);
}
