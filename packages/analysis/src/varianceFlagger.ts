/**
 * Variance Flagger
 *
 * Spread = max - min over the present readings of one file. Files with fewer
 * than two present readings have no spread and are never flagged.
 */

import {
  DEFAULT_VARIANCE_THRESHOLD_BPM,
  byCodeUnit,
  isPresent,
  type Corpus,
  type FileId,
  type MethodName,
} from '@tempo-consensus/core';

export interface VarianceRecord {
  fileId: FileId;
  // Present values only, in method order
  bpmByMethod: ReadonlyMap<MethodName, number>;
  spread: number;
}

/**
 * Spread-descending, then file id ascending
 */
export function compareBySpread(a: VarianceRecord, b: VarianceRecord): number {
  return b.spread - a.spread || byCodeUnit(a.fileId, b.fileId);
}

export function computeVarianceRecord(corpus: Corpus, fileId: FileId): VarianceRecord | null {
  const bpmByMethod = new Map<MethodName, number>();
  for (const method of corpus.allMethods()) {
    const reading = corpus.reading(fileId, method);
    if (isPresent(reading)) {
      bpmByMethod.set(method, reading.bpm);
    }
  }

  if (bpmByMethod.size < 2) {
    return null;
  }

  const values = [...bpmByMethod.values()];
  return {
    fileId,
    bpmByMethod,
    spread: Math.max(...values) - Math.min(...values),
  };
}

/**
 * Records for every file with at least two present readings, spread-descending
 */
export function computeVarianceRecords(corpus: Corpus): VarianceRecord[] {
  const records: VarianceRecord[] = [];
  for (const fileId of corpus.allFiles()) {
    const record = computeVarianceRecord(corpus, fileId);
    if (record) {
      records.push(record);
    }
  }
  return records.sort(compareBySpread);
}

/**
 * Files whose spread is strictly above the threshold
 */
export function flagHighVariance(
  corpus: Corpus,
  threshold: number = DEFAULT_VARIANCE_THRESHOLD_BPM
): VarianceRecord[] {
  return computeVarianceRecords(corpus).filter((record) => record.spread > threshold);
}
