/**
 * Estimate Types
 *
 * A BPM slot is always a tagged reading so that a failed detection can never
 * be mistaken for a tempo of zero.
 */

/** Opaque file identifier, usually a path */
export type FileId = string;

/** Name of a tempo-estimation method; the set is open */
export type MethodName = string;

export interface PresentReading {
  readonly kind: 'present';
  readonly bpm: number;
}

export interface AbsentReading {
  readonly kind: 'absent';
}

export type BpmReading = PresentReading | AbsentReading;

/**
 * One (file, method) result at the ingestion boundary.
 * `bpm: null` marks a detection failure.
 */
export interface TempoEstimate {
  fileId: FileId;
  method: MethodName;
  bpm: number | null;
}

export const ABSENT: AbsentReading = Object.freeze({ kind: 'absent' });

export function present(bpm: number): PresentReading {
  return Object.freeze({ kind: 'present', bpm });
}

export function isPresent(reading: BpmReading): reading is PresentReading {
  return reading.kind === 'present';
}

/**
 * Reading back to the boundary form
 */
export function readingToBpm(reading: BpmReading): number | null {
  return isPresent(reading) ? reading.bpm : null;
}
