/**
 * Statistics Aggregator
 *
 * Per-method descriptive statistics over present values only.
 */

import { isPresent, type Corpus, type MethodName } from '@tempo-consensus/core';

export interface BpmSummary {
  mean: number;
  min: number;
  max: number;
}

export interface MethodStatistics {
  method: MethodName;
  // Files with a present value
  count: number;
  // Corpus size, the coverage denominator
  totalFiles: number;
  // null when count is 0
  summary: BpmSummary | null;
}

export function computeMethodStatistics(corpus: Corpus, method: MethodName): MethodStatistics {
  let count = 0;
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;

  for (const fileId of corpus.allFiles()) {
    const reading = corpus.reading(fileId, method);
    if (!isPresent(reading)) continue;

    count++;
    sum += reading.bpm;
    min = Math.min(min, reading.bpm);
    max = Math.max(max, reading.bpm);
  }

  return {
    method,
    count,
    totalFiles: corpus.size,
    summary: count === 0 ? null : { mean: sum / count, min, max },
  };
}

/**
 * Statistics for every method, in method order
 */
export function computeStatistics(corpus: Corpus): MethodStatistics[] {
  return corpus.allMethods().map((method) => computeMethodStatistics(corpus, method));
}

/**
 * count / totalFiles, e.g. 0.75
 */
export function coverage(stats: MethodStatistics): number {
  return stats.count / stats.totalFiles;
}
